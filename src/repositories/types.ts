import type {
  IdeaPatch,
  IdeaRecord,
  NewIdea,
  NewReview,
  NewUser,
  NewVerificationRequest,
  ReviewRecord,
  UserPatch,
  UserRecord,
  VerificationPatch,
  VerificationRequestRecord,
  VerificationStatus,
} from "../domain/types";

export interface UserRepository {
  findById(id: string): Promise<UserRecord | null>;
  /** case-insensitive */
  findByEmail(email: string): Promise<UserRecord | null>;
  findAnyAdmin(): Promise<UserRecord | null>;
  list(): Promise<UserRecord[]>;
  count(): Promise<number>;
  /** throws DuplicateEmail when the email is taken */
  insert(input: NewUser): Promise<UserRecord>;
  update(id: string, patch: UserPatch): Promise<UserRecord | null>;
  delete(id: string): Promise<boolean>;
}

export interface IdeaRepository {
  findById(id: string): Promise<IdeaRecord | null>;
  /** insertion order */
  list(): Promise<IdeaRecord[]>;
  listByAuthor(authorId: string): Promise<IdeaRecord[]>;
  count(): Promise<number>;
  insert(input: NewIdea): Promise<IdeaRecord>;
  update(id: string, patch: IdeaPatch): Promise<IdeaRecord | null>;
  incrementUpvotes(id: string): Promise<IdeaRecord | null>;
  /** clears authorId on every idea of the author; returns how many changed */
  detachAuthor(authorId: string): Promise<number>;
  delete(id: string): Promise<boolean>;
}

export interface ReviewRepository {
  /** oldest first */
  listByIdea(ideaId: string): Promise<ReviewRecord[]>;
  insert(input: NewReview): Promise<ReviewRecord>;
  deleteByIdea(ideaId: string): Promise<number>;
  detachReviewer(reviewerId: string): Promise<number>;
}

export interface VerificationRepository {
  findById(id: string): Promise<VerificationRequestRecord | null>;
  /** oldest first */
  listByStatus(status: VerificationStatus): Promise<VerificationRequestRecord[]>;
  /** newest first */
  listByRequester(requesterId: string): Promise<VerificationRequestRecord[]>;
  insert(input: NewVerificationRequest): Promise<VerificationRequestRecord>;
  update(id: string, patch: VerificationPatch): Promise<VerificationRequestRecord | null>;
  deleteByRequester(requesterId: string): Promise<number>;
}

export interface Repositories {
  users: UserRepository;
  ideas: IdeaRepository;
  reviews: ReviewRepository;
  verifications: VerificationRepository;
  /**
   * Runs fn against repositories bound to one transaction. Either every write
   * made through `tx` commits or none does; storage failures surface as
   * TransactionFailure, domain errors thrown by fn are rethrown as-is after
   * rollback. Calling transaction() on `tx` joins the running transaction.
   */
  transaction<T>(fn: (tx: Repositories) => Promise<T>): Promise<T>;
}

export type VerificationStatus = "pending" | "approved" | "rejected";

export const VERIFICATION_STATUSES: readonly VerificationStatus[] = ["pending", "approved", "rejected"];

export interface UserRecord {
  id: string;
  name: string;
  email: string;
  passwordHash: string;
  bio: string;
  isAdmin: boolean;
  badge: string | null;
  createdAt: Date;
}

export interface IdeaRecord {
  id: string;
  title: string;
  description: string;
  /** comma-delimited, as entered by the author */
  tags: string;
  authorId: string | null;
  attachments: string[];
  priority: boolean;
  avgRating: number;
  upvotes: number;
  createdAt: Date;
}

export interface ReviewRecord {
  id: string;
  ideaId: string;
  reviewerId: string | null;
  rating: number;
  comment: string;
  createdAt: Date;
}

export interface VerificationRequestRecord {
  id: string;
  requesterId: string;
  claim: string;
  details: string;
  proofs: string[];
  status: VerificationStatus;
  adminNote: string | null;
  reviewerId: string | null;
  reviewedAt: Date | null;
  createdAt: Date;
}

export type NewUser = Omit<UserRecord, "id" | "createdAt">;
export type NewIdea = Omit<IdeaRecord, "id" | "createdAt">;
export type NewReview = Omit<ReviewRecord, "id" | "createdAt">;
export type NewVerificationRequest = Omit<VerificationRequestRecord, "id" | "createdAt">;

export type UserPatch = Partial<Pick<UserRecord, "name" | "bio" | "badge" | "isAdmin">>;
export type IdeaPatch = Partial<Pick<IdeaRecord, "priority" | "avgRating" | "authorId">>;
export type VerificationPatch = Partial<
  Pick<VerificationRequestRecord, "status" | "adminNote" | "reviewerId" | "reviewedAt">
>;

/** What other users may see of an account. */
export interface PublicUser {
  id: string;
  name: string;
  bio: string;
  badge: string | null;
  isAdmin: boolean;
  createdAt: Date;
}

export function toPublicUser(u: UserRecord): PublicUser {
  return { id: u.id, name: u.name, bio: u.bio, badge: u.badge, isAdmin: u.isAdmin, createdAt: u.createdAt };
}

/** The account as its owner (or an admin) sees it. */
export type AccountView = PublicUser & { email: string };

export function toAccountView(u: UserRecord): AccountView {
  return { ...toPublicUser(u), email: u.email };
}

import { DuplicateEmailError, asTransactionFailure } from "../domain/errors";
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
import type {
  IdeaRepository,
  Repositories,
  ReviewRepository,
  UserRepository,
  VerificationRepository,
} from "./types";

export interface MemoryState {
  seq: number;
  users: Map<string, UserRecord>;
  ideas: Map<string, IdeaRecord>;
  reviews: Map<string, ReviewRecord>;
  verifications: Map<string, VerificationRequestRecord>;
}

function nextId(state: MemoryState, prefix: string): string {
  state.seq += 1;
  return `${prefix}_${state.seq}`;
}

/**
 * Process-local storage shared by every MemoryRepositories view. Writes are
 * serialised; a transaction works on a private copy that replaces the
 * committed state only when its body succeeds.
 */
export class MemoryStore {
  state: MemoryState = {
    seq: 0,
    users: new Map(),
    ideas: new Map(),
    reviews: new Map(),
    verifications: new Map(),
  };

  private tail: Promise<void> = Promise.resolve();

  /** Queue fn behind every write and transaction already queued. */
  serialize<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

/** What a repository reads from and how its writes are applied. */
export interface StateAccess {
  readonly state: MemoryState;
  readonly inTransaction: boolean;
  mutate<T>(fn: (state: MemoryState) => T): Promise<T>;
}

function committedAccess(store: MemoryStore): StateAccess {
  return {
    get state() {
      return store.state;
    },
    inTransaction: false,
    mutate<T>(fn: (state: MemoryState) => T) {
      return store.serialize(async () => fn(store.state));
    },
  };
}

function transactionAccess(working: MemoryState): StateAccess {
  return {
    state: working,
    inTransaction: true,
    async mutate<T>(fn: (state: MemoryState) => T) {
      return fn(working);
    },
  };
}

const copy = <T>(v: T): T => structuredClone(v);

function findUserByEmail(state: MemoryState, email: string): UserRecord | undefined {
  const wanted = email.trim().toLowerCase();
  for (const u of state.users.values()) if (u.email === wanted) return u;
  return undefined;
}

export class MemoryUserRepository implements UserRepository {
  constructor(private readonly access: StateAccess) {}

  private get rows() {
    return this.access.state.users;
  }

  async findById(id: string) {
    const u = this.rows.get(id);
    return u ? copy(u) : null;
  }

  async findByEmail(email: string) {
    const u = findUserByEmail(this.access.state, email);
    return u ? copy(u) : null;
  }

  async findAnyAdmin() {
    for (const u of this.rows.values()) if (u.isAdmin) return copy(u);
    return null;
  }

  async list() {
    return [...this.rows.values()].map(copy);
  }

  async count() {
    return this.rows.size;
  }

  insert(input: NewUser) {
    return this.access.mutate((state) => {
      const email = input.email.trim().toLowerCase();
      if (findUserByEmail(state, email)) throw new DuplicateEmailError();
      const user: UserRecord = { ...input, email, id: nextId(state, "user"), createdAt: new Date() };
      state.users.set(user.id, user);
      return copy(user);
    });
  }

  update(id: string, patch: UserPatch) {
    return this.access.mutate((state) => {
      const u = state.users.get(id);
      if (!u) return null;
      Object.assign(u, patch);
      return copy(u);
    });
  }

  delete(id: string) {
    return this.access.mutate((state) => state.users.delete(id));
  }
}

export class MemoryIdeaRepository implements IdeaRepository {
  constructor(private readonly access: StateAccess) {}

  private get rows() {
    return this.access.state.ideas;
  }

  async findById(id: string) {
    const i = this.rows.get(id);
    return i ? copy(i) : null;
  }

  async list() {
    return [...this.rows.values()].map(copy);
  }

  async listByAuthor(authorId: string) {
    return [...this.rows.values()].filter((i) => i.authorId === authorId).map(copy);
  }

  async count() {
    return this.rows.size;
  }

  insert(input: NewIdea) {
    return this.access.mutate((state) => {
      const idea: IdeaRecord = { ...copy(input), id: nextId(state, "idea"), createdAt: new Date() };
      state.ideas.set(idea.id, idea);
      return copy(idea);
    });
  }

  update(id: string, patch: IdeaPatch) {
    return this.access.mutate((state) => {
      const i = state.ideas.get(id);
      if (!i) return null;
      Object.assign(i, patch);
      return copy(i);
    });
  }

  incrementUpvotes(id: string) {
    return this.access.mutate((state) => {
      const i = state.ideas.get(id);
      if (!i) return null;
      i.upvotes += 1;
      return copy(i);
    });
  }

  detachAuthor(authorId: string) {
    return this.access.mutate((state) => {
      let n = 0;
      for (const i of state.ideas.values()) {
        if (i.authorId === authorId) {
          i.authorId = null;
          n++;
        }
      }
      return n;
    });
  }

  delete(id: string) {
    return this.access.mutate((state) => state.ideas.delete(id));
  }
}

export class MemoryReviewRepository implements ReviewRepository {
  constructor(private readonly access: StateAccess) {}

  async listByIdea(ideaId: string) {
    return [...this.access.state.reviews.values()].filter((r) => r.ideaId === ideaId).map(copy);
  }

  insert(input: NewReview) {
    return this.access.mutate((state) => {
      const review: ReviewRecord = { ...input, id: nextId(state, "review"), createdAt: new Date() };
      state.reviews.set(review.id, review);
      return copy(review);
    });
  }

  deleteByIdea(ideaId: string) {
    return this.access.mutate((state) => {
      let n = 0;
      for (const [id, r] of state.reviews) {
        if (r.ideaId === ideaId) {
          state.reviews.delete(id);
          n++;
        }
      }
      return n;
    });
  }

  detachReviewer(reviewerId: string) {
    return this.access.mutate((state) => {
      let n = 0;
      for (const r of state.reviews.values()) {
        if (r.reviewerId === reviewerId) {
          r.reviewerId = null;
          n++;
        }
      }
      return n;
    });
  }
}

export class MemoryVerificationRepository implements VerificationRepository {
  constructor(private readonly access: StateAccess) {}

  private get rows() {
    return this.access.state.verifications;
  }

  async findById(id: string) {
    const v = this.rows.get(id);
    return v ? copy(v) : null;
  }

  async listByStatus(status: VerificationStatus) {
    return [...this.rows.values()].filter((v) => v.status === status).map(copy);
  }

  async listByRequester(requesterId: string) {
    return [...this.rows.values()]
      .filter((v) => v.requesterId === requesterId)
      .reverse()
      .map(copy);
  }

  insert(input: NewVerificationRequest) {
    return this.access.mutate((state) => {
      const req: VerificationRequestRecord = {
        ...copy(input),
        id: nextId(state, "verification"),
        createdAt: new Date(),
      };
      state.verifications.set(req.id, req);
      return copy(req);
    });
  }

  update(id: string, patch: VerificationPatch) {
    return this.access.mutate((state) => {
      const v = state.verifications.get(id);
      if (!v) return null;
      Object.assign(v, patch);
      return copy(v);
    });
  }

  deleteByRequester(requesterId: string) {
    return this.access.mutate((state) => {
      let n = 0;
      for (const [id, v] of state.verifications) {
        if (v.requesterId === requesterId) {
          state.verifications.delete(id);
          n++;
        }
      }
      return n;
    });
  }
}

/** In-process repositories; used by the test suite and for local experiments. */
export class MemoryRepositories implements Repositories {
  readonly users: UserRepository;
  readonly ideas: IdeaRepository;
  readonly reviews: ReviewRepository;
  readonly verifications: VerificationRepository;
  private readonly access: StateAccess;

  constructor(readonly store: MemoryStore = new MemoryStore(), access?: StateAccess) {
    this.access = access ?? committedAccess(store);
    this.users = new MemoryUserRepository(this.access);
    this.ideas = new MemoryIdeaRepository(this.access);
    this.reviews = new MemoryReviewRepository(this.access);
    this.verifications = new MemoryVerificationRepository(this.access);
  }

  async transaction<T>(fn: (tx: Repositories) => Promise<T>): Promise<T> {
    if (this.access.inTransaction) return fn(this);

    return this.store.serialize(async () => {
      const working = structuredClone(this.store.state);
      let result: T;
      try {
        result = await fn(new MemoryRepositories(this.store, transactionAccess(working)));
      } catch (err) {
        throw asTransactionFailure(err);
      }
      this.store.state = working;
      return result;
    });
  }
}

import mongoose, { type ClientSession } from "mongoose";
import { User, type IUser } from "../models/user.model";
import { Idea, type IIdea } from "../models/idea.model";
import { Review, type IReview } from "../models/review.model";
import { VerificationRequest, type IVerificationRequest } from "../models/verificationRequest.model";
import { DuplicateEmailError, TransactionFailureError, asTransactionFailure } from "../domain/errors";
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

const isValidObjectId = (id: string) => mongoose.Types.ObjectId.isValid(id);

function isDuplicateKey(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === 11000;
}

const idOrNull = (v: mongoose.Types.ObjectId | null | undefined) => (v ? String(v) : null);

function toUser(doc: IUser): UserRecord {
  return {
    id: String(doc._id),
    name: doc.name,
    email: doc.email,
    passwordHash: doc.password,
    bio: doc.bio ?? "",
    isAdmin: doc.isAdmin,
    badge: doc.badge ?? null,
    createdAt: doc.createdAt,
  };
}

function toIdea(doc: IIdea): IdeaRecord {
  return {
    id: String(doc._id),
    title: doc.title,
    description: doc.description,
    tags: doc.tags ?? "",
    authorId: idOrNull(doc.authorId),
    attachments: [...doc.attachments],
    priority: doc.priority,
    avgRating: doc.avgRating,
    upvotes: doc.upvotes,
    createdAt: doc.createdAt,
  };
}

function toReview(doc: IReview): ReviewRecord {
  return {
    id: String(doc._id),
    ideaId: String(doc.ideaId),
    reviewerId: idOrNull(doc.reviewerId),
    rating: doc.rating,
    comment: doc.comment ?? "",
    createdAt: doc.createdAt,
  };
}

function toVerification(doc: IVerificationRequest): VerificationRequestRecord {
  return {
    id: String(doc._id),
    requesterId: String(doc.requesterId),
    claim: doc.claim,
    details: doc.details ?? "",
    proofs: [...doc.proofs],
    status: doc.status,
    adminNote: doc.adminNote ?? null,
    reviewerId: idOrNull(doc.reviewerId),
    reviewedAt: doc.reviewedAt ?? null,
    createdAt: doc.createdAt,
  };
}

class MongoUserRepository implements UserRepository {
  constructor(private readonly session: ClientSession | null) {}

  async findById(id: string) {
    if (!isValidObjectId(id)) return null;
    const doc = await User.findById(id).session(this.session);
    return doc ? toUser(doc) : null;
  }

  async findByEmail(email: string) {
    const doc = await User.findOne({ email: email.trim().toLowerCase() }).session(this.session);
    return doc ? toUser(doc) : null;
  }

  async findAnyAdmin() {
    const doc = await User.findOne({ isAdmin: true }).session(this.session);
    return doc ? toUser(doc) : null;
  }

  async list() {
    const docs = await User.find().sort({ createdAt: 1 }).session(this.session);
    return docs.map(toUser);
  }

  count() {
    return User.countDocuments().session(this.session).exec();
  }

  async insert(input: NewUser) {
    try {
      const doc = await new User({
        email: input.email.trim().toLowerCase(),
        name: input.name,
        password: input.passwordHash,
        bio: input.bio,
        isAdmin: input.isAdmin,
        badge: input.badge,
      }).save({ session: this.session });
      return toUser(doc);
    } catch (err) {
      if (isDuplicateKey(err)) throw new DuplicateEmailError();
      throw err;
    }
  }

  async update(id: string, patch: UserPatch) {
    if (!isValidObjectId(id)) return null;
    const doc = await User.findByIdAndUpdate(id, { $set: patch }, { new: true }).session(this.session);
    return doc ? toUser(doc) : null;
  }

  async delete(id: string) {
    if (!isValidObjectId(id)) return false;
    const res = await User.deleteOne({ _id: id }).session(this.session);
    return res.deletedCount > 0;
  }
}

class MongoIdeaRepository implements IdeaRepository {
  constructor(private readonly session: ClientSession | null) {}

  async findById(id: string) {
    if (!isValidObjectId(id)) return null;
    const doc = await Idea.findById(id).session(this.session);
    return doc ? toIdea(doc) : null;
  }

  async list() {
    const docs = await Idea.find().sort({ createdAt: 1, _id: 1 }).session(this.session);
    return docs.map(toIdea);
  }

  async listByAuthor(authorId: string) {
    if (!isValidObjectId(authorId)) return [];
    const docs = await Idea.find({ authorId }).sort({ createdAt: 1, _id: 1 }).session(this.session);
    return docs.map(toIdea);
  }

  count() {
    return Idea.countDocuments().session(this.session).exec();
  }

  async insert(input: NewIdea) {
    const doc = await new Idea(input).save({ session: this.session });
    return toIdea(doc);
  }

  async update(id: string, patch: IdeaPatch) {
    if (!isValidObjectId(id)) return null;
    const doc = await Idea.findByIdAndUpdate(id, { $set: patch }, { new: true }).session(this.session);
    return doc ? toIdea(doc) : null;
  }

  async incrementUpvotes(id: string) {
    if (!isValidObjectId(id)) return null;
    const doc = await Idea.findByIdAndUpdate(id, { $inc: { upvotes: 1 } }, { new: true }).session(this.session);
    return doc ? toIdea(doc) : null;
  }

  async detachAuthor(authorId: string) {
    if (!isValidObjectId(authorId)) return 0;
    const res = await Idea.updateMany({ authorId }, { $set: { authorId: null } }).session(this.session);
    return res.modifiedCount;
  }

  async delete(id: string) {
    if (!isValidObjectId(id)) return false;
    const res = await Idea.deleteOne({ _id: id }).session(this.session);
    return res.deletedCount > 0;
  }
}

class MongoReviewRepository implements ReviewRepository {
  constructor(private readonly session: ClientSession | null) {}

  async listByIdea(ideaId: string) {
    if (!isValidObjectId(ideaId)) return [];
    const docs = await Review.find({ ideaId }).sort({ createdAt: 1, _id: 1 }).session(this.session);
    return docs.map(toReview);
  }

  async insert(input: NewReview) {
    const doc = await new Review(input).save({ session: this.session });
    return toReview(doc);
  }

  async deleteByIdea(ideaId: string) {
    if (!isValidObjectId(ideaId)) return 0;
    const res = await Review.deleteMany({ ideaId }).session(this.session);
    return res.deletedCount;
  }

  async detachReviewer(reviewerId: string) {
    if (!isValidObjectId(reviewerId)) return 0;
    const res = await Review.updateMany({ reviewerId }, { $set: { reviewerId: null } }).session(this.session);
    return res.modifiedCount;
  }
}

class MongoVerificationRepository implements VerificationRepository {
  constructor(private readonly session: ClientSession | null) {}

  async findById(id: string) {
    if (!isValidObjectId(id)) return null;
    const doc = await VerificationRequest.findById(id).session(this.session);
    return doc ? toVerification(doc) : null;
  }

  async listByStatus(status: VerificationStatus) {
    const docs = await VerificationRequest.find({ status }).sort({ createdAt: 1, _id: 1 }).session(this.session);
    return docs.map(toVerification);
  }

  async listByRequester(requesterId: string) {
    if (!isValidObjectId(requesterId)) return [];
    const docs = await VerificationRequest.find({ requesterId })
      .sort({ createdAt: -1, _id: -1 })
      .session(this.session);
    return docs.map(toVerification);
  }

  async insert(input: NewVerificationRequest) {
    const doc = await new VerificationRequest(input).save({ session: this.session });
    return toVerification(doc);
  }

  async update(id: string, patch: VerificationPatch) {
    if (!isValidObjectId(id)) return null;
    const doc = await VerificationRequest.findByIdAndUpdate(id, { $set: patch }, { new: true }).session(
      this.session
    );
    return doc ? toVerification(doc) : null;
  }

  async deleteByRequester(requesterId: string) {
    if (!isValidObjectId(requesterId)) return 0;
    const res = await VerificationRequest.deleteMany({ requesterId }).session(this.session);
    return res.deletedCount;
  }
}

/**
 * Mongoose-backed repositories. Multi-document transactions need MongoDB
 * running as a replica set (a single-node one is enough).
 */
export class MongoRepositories implements Repositories {
  readonly users: UserRepository;
  readonly ideas: IdeaRepository;
  readonly reviews: ReviewRepository;
  readonly verifications: VerificationRepository;

  constructor(private readonly session: ClientSession | null = null) {
    this.users = new MongoUserRepository(session);
    this.ideas = new MongoIdeaRepository(session);
    this.reviews = new MongoReviewRepository(session);
    this.verifications = new MongoVerificationRepository(session);
  }

  async transaction<T>(fn: (tx: Repositories) => Promise<T>): Promise<T> {
    if (this.session) return fn(this);

    const session = await mongoose.startSession();
    try {
      // withTransaction may re-run the callback on transient errors; keep the last result
      const results: T[] = [];
      await session.withTransaction(async () => {
        results.length = 0;
        results.push(await fn(new MongoRepositories(session)));
      });
      if (results.length === 0) throw new TransactionFailureError("Transaction aborted");
      return results[results.length - 1];
    } catch (err) {
      throw asTransactionFailure(err);
    } finally {
      await session.endSession();
    }
  }
}

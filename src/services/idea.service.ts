import type { Repositories } from "../repositories/types";
import type { Session } from "../domain/session";
import type { IdeaRecord, ReviewRecord, UserRecord } from "../domain/types";
import { NotFoundError, ValidationError } from "../domain/errors";
import type { BlobStore } from "../storage/blobStore";
import { authorize, requireUser } from "../utils/authz";
import { rankIdeas, scoreIdea } from "../utils/ranking";
import { recomputeAverage } from "../utils/rating";
import { searchIdeas, type SearchCriteria } from "../utils/search";
import { requireText } from "../utils/validate";
import logger from "../utils/logger";

export const DELETED_USER = "deleted user";

export interface AttachmentInput {
  name: string;
  data: Buffer;
}

export interface SubmitIdeaInput {
  title: string;
  description: string;
  tags?: string;
  attachments?: AttachmentInput[];
}

export interface ReviewInput {
  rating: number;
  comment?: string;
}

export type RankedIdea = IdeaRecord & { score: number };

export interface AuthorView {
  id: string | null;
  name: string;
  badge: string | null;
}

export interface ReviewView extends ReviewRecord {
  reviewerName: string;
}

export interface IdeaDetail {
  idea: RankedIdea;
  author: AuthorView;
  reviews: ReviewView[];
}

export function withScore(idea: IdeaRecord): RankedIdea {
  return { ...idea, score: scoreIdea(idea) };
}

export function authorView(user: UserRecord | null): AuthorView {
  return user
    ? { id: user.id, name: user.name, badge: user.badge }
    : { id: null, name: DELETED_USER, badge: null };
}

/** Stores every attachment and returns their handles in input order. */
export async function storeAttachments(blobs: BlobStore, files: AttachmentInput[] = []): Promise<string[]> {
  const handles: string[] = [];
  for (const f of files) {
    handles.push(await blobs.store(f.data, f.name));
  }
  return handles;
}

export class IdeaService {
  constructor(
    private readonly repos: Repositories,
    private readonly blobs: BlobStore
  ) {}

  async submit(session: Session, input: SubmitIdeaInput): Promise<IdeaRecord> {
    const authorId = requireUser(session, "submitIdea");
    const title = requireText(input.title, "title");
    const description = requireText(input.description, "description");

    const author = await this.repos.users.findById(authorId);
    if (!author) throw new NotFoundError("User");

    const attachments = await storeAttachments(this.blobs, input.attachments);

    return this.repos.ideas.insert({
      title,
      description,
      tags: (input.tags ?? "").trim(),
      authorId,
      attachments,
      // verified authors get priority from the start
      priority: Boolean(author.badge),
      avgRating: 0,
      upvotes: 0,
    });
  }

  /** Every idea, best score first, optionally narrowed by search criteria. */
  async listRanked(criteria: SearchCriteria = {}): Promise<RankedIdea[]> {
    const ranked = rankIdeas(await this.repos.ideas.list());
    return Array.from(searchIdeas(ranked, criteria), withScore);
  }

  async get(ideaId: string): Promise<IdeaDetail> {
    const idea = await this.repos.ideas.findById(ideaId);
    if (!idea) throw new NotFoundError("Idea");

    const author = idea.authorId ? await this.repos.users.findById(idea.authorId) : null;
    const reviews = await this.repos.reviews.listByIdea(ideaId);

    const names = new Map<string, string>();
    for (const r of reviews) {
      if (r.reviewerId && !names.has(r.reviewerId)) {
        const u = await this.repos.users.findById(r.reviewerId);
        if (u) names.set(u.id, u.name);
      }
    }

    return {
      idea: withScore(idea),
      author: authorView(author),
      reviews: reviews
        .map((r) => ({ ...r, reviewerName: (r.reviewerId && names.get(r.reviewerId)) || DELETED_USER }))
        .reverse(),
    };
  }

  /** Inserts the review and refreshes the idea's average in one transaction. */
  async postReview(session: Session, ideaId: string, input: ReviewInput): Promise<{ review: ReviewRecord; avgRating: number }> {
    const reviewerId = requireUser(session, "postReview");
    if (!Number.isInteger(input.rating) || input.rating < 1 || input.rating > 5) {
      throw new ValidationError("rating must be an integer from 1 to 5");
    }

    return this.repos.transaction(async (tx) => {
      const reviewer = await tx.users.findById(reviewerId);
      if (!reviewer) throw new NotFoundError("User");
      const idea = await tx.ideas.findById(ideaId);
      if (!idea) throw new NotFoundError("Idea");

      const review = await tx.reviews.insert({
        ideaId,
        reviewerId,
        rating: input.rating,
        comment: (input.comment ?? "").trim(),
      });
      const avgRating = await recomputeAverage(tx, ideaId);
      return { review, avgRating };
    });
  }

  async upvote(session: Session, ideaId: string): Promise<IdeaRecord> {
    authorize(session, "upvoteIdea");
    const idea = await this.repos.ideas.incrementUpvotes(ideaId);
    if (!idea) throw new NotFoundError("Idea");
    return idea;
  }

  async delete(session: Session, ideaId: string): Promise<void> {
    authorize(session, "deleteIdea");
    await this.repos.transaction(async (tx) => {
      const removed = await tx.ideas.delete(ideaId);
      if (!removed) throw new NotFoundError("Idea");
      await tx.reviews.deleteByIdea(ideaId);
    });
    logger.info({ ideaId, adminId: session.currentUserId() }, "idea deleted");
  }

  async setPriority(session: Session, ideaId: string, priority: boolean): Promise<IdeaRecord> {
    authorize(session, "setPriority");
    const idea = await this.repos.ideas.update(ideaId, { priority });
    if (!idea) throw new NotFoundError("Idea");
    logger.info({ ideaId, priority, adminId: session.currentUserId() }, "idea priority changed");
    return idea;
  }
}

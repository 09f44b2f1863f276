import type { Repositories } from "../repositories/types";
import type { Session } from "../domain/session";
import type { IdeaRecord, UserRecord, VerificationRequestRecord, VerificationStatus } from "../domain/types";
import { InvalidStateError, NotFoundError } from "../domain/errors";
import type { BlobStore } from "../storage/blobStore";
import { authorize, requireUser } from "../utils/authz";
import { requireText } from "../utils/validate";
import logger from "../utils/logger";
import { storeAttachments, type AttachmentInput } from "./idea.service";

export interface VerificationInput {
  claim: string;
  details?: string;
  proofs?: AttachmentInput[];
}

export interface ReviewDecision {
  requestId: string;
  adminNote?: string | null;
}

export interface ApprovalOutcome {
  request: VerificationRequestRecord;
  user: UserRecord;
  promotedIdeas: IdeaRecord[];
}

export function badgeFor(claim: string): string {
  return `${claim} (Verified)`;
}

function noteOf(note: string | null | undefined): string | null {
  const trimmed = (note ?? "").trim();
  return trimmed ? trimmed : null;
}

async function loadPending(tx: Repositories, requestId: string): Promise<VerificationRequestRecord> {
  const request = await tx.verifications.findById(requestId);
  if (!request) throw new NotFoundError("Verification request");
  if (request.status !== "pending") {
    throw new InvalidStateError(`Verification request already ${request.status}`);
  }
  return request;
}

/**
 * Approves a pending request: marks it approved, grants the requester
 * `<claim> (Verified)` and sets priority on every idea they currently author.
 * Must run inside a single transaction.
 */
export class ApproveVerificationCommand {
  constructor(
    readonly requestId: string,
    readonly reviewerId: string,
    readonly adminNote: string | null
  ) {}

  async execute(tx: Repositories): Promise<ApprovalOutcome> {
    const pending = await loadPending(tx, this.requestId);

    const request = await tx.verifications.update(pending.id, {
      status: "approved",
      adminNote: this.adminNote,
      reviewerId: this.reviewerId,
      reviewedAt: new Date(),
    });
    if (!request) throw new NotFoundError("Verification request");

    const user = await tx.users.update(pending.requesterId, { badge: badgeFor(pending.claim) });
    if (!user) throw new NotFoundError("User");

    const promotedIdeas: IdeaRecord[] = [];
    for (const idea of await tx.ideas.listByAuthor(user.id)) {
      const updated = await tx.ideas.update(idea.id, { priority: true });
      if (!updated) throw new NotFoundError("Idea");
      promotedIdeas.push(updated);
    }

    return { request, user, promotedIdeas };
  }
}

/** Rejects a pending request. Badge and idea priority stay as they are. */
export class RejectVerificationCommand {
  constructor(
    readonly requestId: string,
    readonly reviewerId: string,
    readonly adminNote: string | null
  ) {}

  async execute(tx: Repositories): Promise<VerificationRequestRecord> {
    const pending = await loadPending(tx, this.requestId);
    const request = await tx.verifications.update(pending.id, {
      status: "rejected",
      adminNote: this.adminNote,
      reviewerId: this.reviewerId,
      reviewedAt: new Date(),
    });
    if (!request) throw new NotFoundError("Verification request");
    return request;
  }
}

export class VerificationService {
  constructor(
    private readonly repos: Repositories,
    private readonly blobs: BlobStore
  ) {}

  async request(session: Session, input: VerificationInput): Promise<VerificationRequestRecord> {
    const requesterId = requireUser(session, "requestVerification");
    requireText(input.claim, "claim");
    // the claim becomes the badge exactly as typed
    const claim = input.claim;

    const requester = await this.repos.users.findById(requesterId);
    if (!requester) throw new NotFoundError("User");

    const proofs = await storeAttachments(this.blobs, input.proofs);
    const created = await this.repos.verifications.insert({
      requesterId,
      claim,
      details: (input.details ?? "").trim(),
      proofs,
      status: "pending",
      adminNote: null,
      reviewerId: null,
      reviewedAt: null,
    });
    logger.info({ requestId: created.id, requesterId }, "verification requested");
    return created;
  }

  async listMine(session: Session): Promise<VerificationRequestRecord[]> {
    const userId = requireUser(session, "requestVerification");
    return this.repos.verifications.listByRequester(userId);
  }

  async listByStatus(session: Session, status: VerificationStatus): Promise<VerificationRequestRecord[]> {
    authorize(session, "viewAdminPanel");
    return this.repos.verifications.listByStatus(status);
  }

  async approve(session: Session, decision: ReviewDecision): Promise<ApprovalOutcome> {
    const adminId = requireUser(session, "approveVerification");
    const command = new ApproveVerificationCommand(decision.requestId, adminId, noteOf(decision.adminNote));
    const outcome = await this.repos.transaction((tx) => command.execute(tx));

    logger.info(
      {
        requestId: outcome.request.id,
        userId: outcome.user.id,
        badge: outcome.user.badge,
        promoted: outcome.promotedIdeas.length,
        adminId,
      },
      "verification approved"
    );
    return outcome;
  }

  async reject(session: Session, decision: ReviewDecision): Promise<VerificationRequestRecord> {
    const adminId = requireUser(session, "rejectVerification");
    const command = new RejectVerificationCommand(decision.requestId, adminId, noteOf(decision.adminNote));
    const request = await this.repos.transaction((tx) => command.execute(tx));

    logger.info({ requestId: request.id, adminId }, "verification rejected");
    return request;
  }
}

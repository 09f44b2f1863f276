import type { Repositories } from "../repositories/types";
import type { Session } from "../domain/session";
import {
  toAccountView,
  toPublicUser,
  type AccountView,
  type PublicUser,
  type UserRecord,
  type VerificationRequestRecord,
} from "../domain/types";
import { InvalidStateError, NotFoundError, ValidationError } from "../domain/errors";
import { authorize, requireUser } from "../utils/authz";
import { rankIdeas } from "../utils/ranking";
import logger from "../utils/logger";
import { withScore, type RankedIdea } from "./idea.service";

export interface ProfileUpdate {
  name?: string;
  bio?: string;
}

export interface Profile {
  user: PublicUser;
  ideas: RankedIdea[];
}

export interface PendingVerification extends VerificationRequestRecord {
  requester: { id: string; name: string; email: string } | null;
}

export interface AdminOverview {
  users: number;
  ideas: number;
  pending: PendingVerification[];
}

export class UserService {
  constructor(private readonly repos: Repositories) {}

  async getProfile(userId: string): Promise<Profile> {
    const user = await this.repos.users.findById(userId);
    if (!user) throw new NotFoundError("User");
    const ideas = rankIdeas(await this.repos.ideas.listByAuthor(userId)).map(withScore);
    return { user: toPublicUser(user), ideas };
  }

  async updateProfile(session: Session, update: ProfileUpdate): Promise<UserRecord> {
    const userId = requireUser(session, "updateProfile");

    const patch: ProfileUpdate = {};
    if (update.name !== undefined) {
      const name = update.name.trim();
      if (!name) throw new ValidationError("name is required");
      patch.name = name;
    }
    if (update.bio !== undefined) patch.bio = update.bio.trim();

    const user = await this.repos.users.update(userId, patch);
    if (!user) throw new NotFoundError("User");
    return user;
  }

  async listUsers(session: Session): Promise<AccountView[]> {
    authorize(session, "listUsers");
    const users = await this.repos.users.list();
    return users.map(toAccountView);
  }

  /**
   * Removes the account. Its ideas and reviews stay, shown as written by a
   * deleted user; its verification requests go with it.
   */
  async deleteUser(session: Session, userId: string): Promise<void> {
    const adminId = requireUser(session, "deleteUser");
    if (adminId === userId) throw new InvalidStateError("Administrators cannot delete their own account");

    await this.repos.transaction(async (tx) => {
      const user = await tx.users.findById(userId);
      if (!user) throw new NotFoundError("User");

      await tx.ideas.detachAuthor(userId);
      await tx.reviews.detachReviewer(userId);
      await tx.verifications.deleteByRequester(userId);
      await tx.users.delete(userId);
    });
    logger.info({ userId, adminId }, "user deleted");
  }

  async adminOverview(session: Session): Promise<AdminOverview> {
    authorize(session, "viewAdminPanel");

    const pending = await this.repos.verifications.listByStatus("pending");
    const withRequester: PendingVerification[] = [];
    for (const req of pending) {
      const u = await this.repos.users.findById(req.requesterId);
      withRequester.push({ ...req, requester: u ? { id: u.id, name: u.name, email: u.email } : null });
    }

    return {
      users: await this.repos.users.count(),
      ideas: await this.repos.ideas.count(),
      pending: withRequester,
    };
  }
}

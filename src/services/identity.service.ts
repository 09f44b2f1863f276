import type { Repositories } from "../repositories/types";
import type { Session } from "../domain/session";
import type { UserRecord } from "../domain/types";
import { DuplicateEmailError, InvalidCredentialsError, ValidationError } from "../domain/errors";
import type { PasswordHasher } from "../utils/password";
import { requireText } from "../utils/validate";
import logger from "../utils/logger";

export interface RegisterInput {
  name: string;
  email: string;
  password: string;
  bio?: string;
}

export interface AdminAccount {
  name: string;
  email: string;
  password: string;
}

export class IdentityService {
  constructor(
    private readonly repos: Repositories,
    private readonly hasher: PasswordHasher
  ) {}

  async register(input: RegisterInput): Promise<UserRecord> {
    const name = requireText(input.name, "name");
    const email = requireText(input.email, "email").toLowerCase();
    // passwords are taken as typed, surrounding whitespace included
    if (!input.password) throw new ValidationError("password is required");

    if (await this.repos.users.findByEmail(email)) throw new DuplicateEmailError();

    const passwordHash = await this.hasher.hash(input.password);
    return this.repos.users.insert({
      name,
      email,
      passwordHash,
      bio: (input.bio ?? "").trim(),
      isAdmin: false,
      badge: null,
    });
  }

  /** Verifies the credentials and binds the user to the session. */
  async authenticate(session: Session, email: string, password: string): Promise<UserRecord> {
    const user = await this.repos.users.findByEmail(email);
    if (!user) throw new InvalidCredentialsError();

    const match = await this.hasher.verify(password, user.passwordHash);
    if (!match) throw new InvalidCredentialsError();

    session.setCurrentUser(user.id, user.isAdmin);
    return user;
  }

  logout(session: Session): void {
    session.clear();
  }

  async currentUser(session: Session): Promise<UserRecord | null> {
    const id = session.currentUserId();
    return id ? this.repos.users.findById(id) : null;
  }

  findUser(id: string): Promise<UserRecord | null> {
    return this.repos.users.findById(id);
  }

  /**
   * Creates the bootstrap administrator unless some admin already exists.
   * Safe to call on every start.
   */
  async ensureAdminExists(account: AdminAccount): Promise<{ created: boolean; user: UserRecord }> {
    const existing = await this.repos.users.findAnyAdmin();
    if (existing) return { created: false, user: existing };

    const user = await this.repos.users.insert({
      name: account.name,
      email: account.email.trim().toLowerCase(),
      passwordHash: await this.hasher.hash(account.password),
      bio: "",
      isAdmin: true,
      badge: null,
    });
    logger.warn({ email: user.email }, "created default admin account");
    return { created: true, user };
  }
}

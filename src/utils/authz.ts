/* src/utils/authz.ts */
import type { Session } from "../domain/session";
import { NotPermittedError } from "../domain/errors";

export type Requirement = "anyone" | "user" | "admin";

export type GatedAction =
  | "submitIdea"
  | "postReview"
  | "upvoteIdea"
  | "requestVerification"
  | "updateProfile"
  | "viewAdminPanel"
  | "approveVerification"
  | "rejectVerification"
  | "deleteIdea"
  | "setPriority"
  | "listUsers"
  | "deleteUser";

export const POLICY: Record<GatedAction, Requirement> = {
  submitIdea: "user",
  postReview: "user",
  // anonymous upvotes are allowed
  upvoteIdea: "anyone",
  requestVerification: "user",
  updateProfile: "user",
  viewAdminPanel: "admin",
  approveVerification: "admin",
  rejectVerification: "admin",
  deleteIdea: "admin",
  setPriority: "admin",
  listUsers: "admin",
  deleteUser: "admin",
};

export function isAllowed(session: Session, action: GatedAction): boolean {
  switch (POLICY[action]) {
    case "anyone":
      return true;
    case "user":
      return session.currentUserId() !== null;
    case "admin":
      return session.currentUserId() !== null && session.isAdmin();
  }
}

/** Throws NotPermitted unless the session may perform the action. */
export function authorize(session: Session, action: GatedAction): void {
  if (!isAllowed(session, action)) {
    throw new NotPermittedError(
      POLICY[action] === "admin" ? `${action} requires an administrator` : `${action} requires login`
    );
  }
}

/** Gate for actions bound to a logged-in user; returns that user's id. */
export function requireUser(session: Session, action: GatedAction): string {
  authorize(session, action);
  const id = session.currentUserId();
  if (id === null) throw new NotPermittedError(`${action} requires login`);
  return id;
}

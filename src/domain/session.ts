/**
 * Per-request authentication context. Built fresh for every request (from the
 * bearer token over HTTP) and passed explicitly to every service call.
 */
export class Session {
  private userId: string | null = null;
  private admin = false;

  static anonymous(): Session {
    return new Session();
  }

  static forUser(id: string, isAdmin: boolean): Session {
    const s = new Session();
    s.setCurrentUser(id, isAdmin);
    return s;
  }

  currentUserId(): string | null {
    return this.userId;
  }

  /** cached at authentication time; not re-read from the store */
  isAdmin(): boolean {
    return this.userId !== null && this.admin;
  }

  setCurrentUser(id: string, isAdmin: boolean): void {
    this.userId = id;
    this.admin = isAdmin;
  }

  clear(): void {
    this.userId = null;
    this.admin = false;
  }
}

import type { Session } from "../domain/session";

declare global {
  namespace Express {
    export interface Request {
      /** set by attachSession on every request */
      session?: Session;
      /** a bearer token was sent but failed verification */
      tokenRejected?: boolean;
    }
  }
}

import 'express-session';

declare module 'express-session' {
  interface SessionData {
    /** Set under the per-user policy */
    userId: number;
    username: string;
    authenticated: boolean;
  }
}

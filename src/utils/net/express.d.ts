export {};

declare global {
  namespace Express {
    interface Request {
      /** Set by the token middleware once the caller is authenticated */
      userId?: number;
    }
  }
}

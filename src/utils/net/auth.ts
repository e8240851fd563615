import { NextFunction, Request, RequestHandler, Response } from 'express';
import jwt from 'jsonwebtoken';

/**
 * Verifies a token and returns the `userId` it carries, or `null` when the token is
 * missing, invalid, expired or has no numeric user id
 */
export function readUserId(token: string | undefined, secret: string): number | null {
  if (!token) {
    return null;
  }
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, secret);
  } catch {
    return null;
  }
  if (typeof decoded === 'string' || typeof decoded.userId !== 'number') {
    return null;
  }
  return decoded.userId;
}

/**
 * Middleware taking the caller from the raw `Authorization` header
 */
export function verifyToken(secret: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const userId = readUserId(req.headers.authorization, secret);
    if (userId === null) {
      res.status(401).json({ message: 'Invalid token' });
      return;
    }
    req.userId = userId;
    next();
  };
}

import { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';

export interface AuthUser {
  email: string;
  name?: string;
}

export interface AuthRequest extends Request {
  user?: AuthUser;
}

const authUserSchema = z.object({
  email: z.string().email(),
  name: z.string().optional(),
});

function readToken(req: Request): string | undefined {
  const header = req.headers.authorization;
  if (header?.startsWith('Bearer ')) {
    return header.slice('Bearer '.length);
  }
  const cookie: unknown = req.cookies?.auth_token;
  return typeof cookie === 'string' ? cookie : undefined;
}

export function createRequireAuth(secret: string): RequestHandler {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    const token = readToken(req);

    if (!token) {
      return res.status(401).json({ error: 'Authentication required' });
    }

    try {
      const decoded = authUserSchema.safeParse(jwt.verify(token, secret));
      if (!decoded.success) {
        return res.status(401).json({ error: 'Invalid token payload' });
      }
      req.user = decoded.data;
      next();
    } catch (error) {
      console.error('Token verification failed:', error);
      return res.status(401).json({ error: 'Invalid or expired token' });
    }
  };
}

export function createToken(user: AuthUser, secret: string): string {
  return jwt.sign(user, secret, { expiresIn: '7d' });
}

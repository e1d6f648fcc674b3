// Middleware functions to authenticate users
import jwt from "jsonwebtoken";
import { NextFunction, Request, RequestHandler, Response } from "express";
import { z } from "zod";
import { tokenClaimsSchema } from "../schemas/credentials";

/**
 * Who is making the request. Built once per request from the bearer token
 * and handed to handlers explicitly; it is frozen and never updated.
 */
export interface SessionContext {
  readonly username: string;
}

const sessionSchema = z.object({ username: z.string().min(1) });

export type SessionHandler = (
  session: SessionContext,
  req: Request,
  res: Response
) => Promise<void>;

export function issueToken(
  username: string,
  secret: string,
  expiresInSeconds: number
): string {
  return jwt.sign({}, secret, {
    subject: username,
    expiresIn: expiresInSeconds,
  });
}

export function authenticateToken(secret: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;
    const token = authHeader && authHeader.split(" ")[1];

    if (!token) {
      res.status(401).json({ error: "Authentication required" });
      return;
    }

    jwt.verify(token, secret, (err, decoded) => {
      const claims = tokenClaimsSchema.safeParse(decoded);
      if (err || !claims.success) {
        res.status(403).json({ error: "Invalid or expired token" });
        return;
      }

      const session: SessionContext = Object.freeze({
        username: claims.data.sub,
      });
      res.locals.session = session;
      next();
    });
  };
}

/**
 * Adapts a handler that takes the session as its first argument. Must be
 * mounted after authenticateToken.
 */
export function withSession(handler: SessionHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const parsed = sessionSchema.safeParse(res.locals.session);
    if (!parsed.success) {
      res.status(401).json({ error: "Authentication required" });
      return;
    }
    const session: SessionContext = Object.freeze({
      username: parsed.data.username,
    });
    handler(session, req, res).catch(next);
  };
}

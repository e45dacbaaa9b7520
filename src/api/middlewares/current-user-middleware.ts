import { NextFunction, Request, Response } from "express";
import { getAuth } from "@clerk/express";
import { UserDirectory } from "../../application/user-directory";
import { NotFoundError, UnauthorizedError } from "../../domain/errors/errors";
import { UserAccount } from "../../domain/types";

declare global {
  namespace Express {
    interface Request {
      currentUser?: UserAccount;
    }
  }
}

/**
 * Resolves the signed-in Clerk user to this service's user record, whose
 * username keys every consumption record.
 */
export const createCurrentUserMiddleware =
  (users: UserDirectory) => async (req: Request, res: Response, next: NextFunction) => {
    try {
      const auth = getAuth(req);
      if (!auth.userId) {
        throw new UnauthorizedError("Unauthorized");
      }
      const user = await users.findByClerkUserId(auth.userId);
      if (!user) {
        throw new NotFoundError("User not found");
      }
      req.currentUser = user;
      next();
    } catch (error) {
      next(error);
    }
  };

export const requireCurrentUser = (req: Request): UserAccount => {
  if (!req.currentUser) {
    throw new UnauthorizedError("Unauthorized");
  }
  return req.currentUser;
};

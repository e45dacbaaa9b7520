import { NextFunction, Request, Response } from "express";
import { UpdateProfileDto } from "../domain/dtos/user";
import { NotFoundError, ValidationError } from "../domain/errors/errors";
import { requireCurrentUser } from "../api/middlewares/current-user-middleware";
import { UserDirectory } from "./user-directory";

const LOGIN_HISTORY_LIMIT = 10;

export const createUserHandlers = (users: UserDirectory) => {
  const getAllUsers = async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.status(200).json(await users.listAll());
    } catch (error) {
      next(error);
    }
  };

  const getCurrentUser = (req: Request, res: Response, next: NextFunction) => {
    try {
      res.status(200).json(requireCurrentUser(req));
    } catch (error) {
      next(error);
    }
  };

  const updateCurrentUserProfile = async (
    req: Request,
    res: Response,
    next: NextFunction
  ) => {
    try {
      const result = UpdateProfileDto.safeParse(req.body);
      if (!result.success) {
        throw new ValidationError(result.error.message);
      }

      const user = requireCurrentUser(req);
      const { email, ...profile } = result.data;
      const updated = await users.updateProfile(user.clerkUserId, { email, profile });
      if (!updated) {
        throw new NotFoundError("User not found");
      }
      res.status(200).json(updated);
    } catch (error) {
      next(error);
    }
  };

  const getCurrentUserLogins = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = requireCurrentUser(req);
      res.status(200).json(await users.recentLogins(user.username, LOGIN_HISTORY_LIMIT));
    } catch (error) {
      next(error);
    }
  };

  return {
    getAllUsers,
    getCurrentUser,
    updateCurrentUserProfile,
    getCurrentUserLogins,
  };
};

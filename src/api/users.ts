import express from "express";
import { UserDirectory } from "../application/user-directory";
import { createUserHandlers } from "../application/users";
import { authenticationMiddleware } from "./middlewares/authentication-middleware";
import { authorizationMiddleware } from "./middlewares/authorization-middleware";
import { createCurrentUserMiddleware } from "./middlewares/current-user-middleware";

export const createUsersRouter = (users: UserDirectory) => {
  const usersRouter = express.Router();
  const currentUserMiddleware = createCurrentUserMiddleware(users);
  const { getAllUsers, getCurrentUser, updateCurrentUserProfile, getCurrentUserLogins } =
    createUserHandlers(users);

  usersRouter
    .route("/")
    .get(authenticationMiddleware, currentUserMiddleware, authorizationMiddleware, getAllUsers);
  usersRouter.route("/me").get(authenticationMiddleware, currentUserMiddleware, getCurrentUser);
  usersRouter
    .route("/me/profile")
    .put(authenticationMiddleware, currentUserMiddleware, updateCurrentUserProfile);
  usersRouter
    .route("/me/logins")
    .get(authenticationMiddleware, currentUserMiddleware, getCurrentUserLogins);

  return usersRouter;
};

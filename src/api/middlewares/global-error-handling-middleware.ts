import { NextFunction, Request, Response } from "express";
import { DatabaseError, isServerUnavailableError } from "../../domain/errors/errors";

const STATUS_BY_ERROR_NAME: Record<string, number> = {
  NotFoundError: 404,
  ValidationError: 400,
  InvalidInputError: 400,
  UnauthorizedError: 401,
  ForbiddenError: 403,
};

export const globalErrorHandler = (
  err: Error,
  req: Request,
  res: Response,
  next: NextFunction
) => {
  console.error(err);

  const status = STATUS_BY_ERROR_NAME[err.name];
  if (status) {
    res.status(status).json({ message: err.message });
    return;
  }

  if ((err instanceof DatabaseError && err.serverUnavailable) || isServerUnavailableError(err)) {
    res.status(503).json({ message: "Database unavailable, please try again later" });
    return;
  }

  if (err instanceof DatabaseError) {
    res.status(500).json({ message: "Failed to access stored data" });
    return;
  }

  // Handle other errors
  res.status(500).json({ message: "Internal server error" });
};

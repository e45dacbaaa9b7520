import { NextFunction, Request, Response } from "express";
import { getAuth } from "@clerk/express";
import { ForbiddenError, UnauthorizedError } from "../../domain/errors/errors";
import { SessionClaimsDto } from "../../domain/dtos/user";

/**
 * Admin-only routes. The role comes from the session's public metadata
 * claim, or from the role synced onto the user record by the Clerk webhook.
 */
export const authorizationMiddleware = (
    req: Request,
    res: Response,
    next: NextFunction
) => {
    const auth = getAuth(req);
    if (!auth.userId) {
        throw new UnauthorizedError("Unauthorized");
    }

    const claims = SessionClaimsDto.safeParse(auth.sessionClaims);
    const role = (claims.success ? claims.data.metadata?.role : undefined) ?? req.currentUser?.role;

    if (role !== "admin") {
        throw new ForbiddenError("Forbidden");
    }
    next();
};

import { Request, Response, NextFunction, RequestHandler } from "express";
import jwt from "jsonwebtoken";
import { createModuleLogger } from "../config/logger";
import { AppError, UnauthorizedError, ForbiddenError, CACHE_KEYS, UserRole } from "../types/common.types";
import { Actor, AuthenticatedUser, jwtPayloadSchema } from "../types/auth.types";
import type { CacheStore } from "../types/cache.types";

const moduleLogger = createModuleLogger("AuthMiddleware");

export interface AuthenticatorOptions {
  secret: string;
  issuer?: string | undefined;
  blacklist: Pick<CacheStore, "exists">;
}

export interface Authenticator {
  authenticateToken: RequestHandler;
  requireRole: (...roles: UserRole[]) => RequestHandler;
  verifyToken: (token: string) => Promise<AuthenticatedUser>;
}

export const extractBearerToken = (header: string | undefined): string | undefined => {
  if (!header) return undefined;

  const [scheme, token] = header.split(" ");
  return scheme === "Bearer" && token ? token : undefined;
};

/** The authenticated caller; only valid behind `authenticateToken`. */
export const getActor = (req: Request): Actor => {
  if (!req.user) {
    throw new UnauthorizedError("Authentication required");
  }
  return { id: req.user.id, role: req.user.role };
};

export const createAuthenticator = (options: AuthenticatorOptions): Authenticator => {
  const verifyToken = async (token: string): Promise<AuthenticatedUser> => {
    const decoded = jwt.verify(token, options.secret, {
      algorithms: ["HS256"],
      ...(options.issuer && { issuer: options.issuer }),
    });

    const parsed = jwtPayloadSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new UnauthorizedError("Invalid token payload");
    }

    const payload = parsed.data;

    // Check if token is blacklisted
    if (payload.jti && (await options.blacklist.exists(CACHE_KEYS.TOKEN_BLACKLIST(payload.jti)))) {
      throw new UnauthorizedError("Token has been revoked");
    }

    return {
      id: payload.id,
      role: payload.role,
      email: payload.email,
      tokenId: payload.jti,
    };
  };

  const authenticateToken = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const token = extractBearerToken(req.headers.authorization);

      if (!token) {
        throw new UnauthorizedError("Access token required");
      }

      req.user = await verifyToken(token);

      moduleLogger.debug(
        {
          userId: req.user.id,
          role: req.user.role,
          correlationId: req.correlationId,
        },
        "User authenticated"
      );

      next();
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        return next(new UnauthorizedError("Token expired"));
      }

      if (error instanceof jwt.JsonWebTokenError) {
        return next(new UnauthorizedError("Invalid token"));
      }

      if (error instanceof AppError) {
        return next(error);
      }

      moduleLogger.error({ error }, "Authentication error");
      return next(new UnauthorizedError("Authentication failed"));
    }
  };

  // Role-based access control
  const requireRole = (...roles: UserRole[]): RequestHandler => {
    return (req: Request, res: Response, next: NextFunction): void => {
      if (!req.user) {
        return next(new UnauthorizedError("Authentication required"));
      }

      if (!roles.includes(req.user.role)) {
        return next(new ForbiddenError("Insufficient permissions"));
      }

      next();
    };
  };

  return {
    authenticateToken: (req, res, next) => {
      void authenticateToken(req, res, next);
    },
    requireRole,
    verifyToken,
  };
};

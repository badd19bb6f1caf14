import { z } from "zod";
import { UserRole } from "./common.types";

// JWT payload issued by the identity service
export const jwtPayloadSchema = z.object({
  id: z.string().min(1),
  email: z.string().email().optional(),
  role: z.nativeEnum(UserRole),
  jti: z.string().optional(),
  iat: z.number().optional(),
  exp: z.number().optional(),
});

export type JwtPayload = z.infer<typeof jwtPayloadSchema>;

/** Whoever is acting on a request. A doctor's id is their doctor id. */
export interface Actor {
  id: string;
  role: UserRole;
}

export interface AuthenticatedUser extends Actor {
  email?: string | undefined;
  tokenId?: string | undefined;
}

// Express Request augmentation
declare global {
  namespace Express {
    interface Request {
      user?: AuthenticatedUser;
      correlationId?: string;
    }
  }
}

import { createModuleLogger } from "@/shared/config/logger";
import { extractBearerToken } from "@/shared/middleware/auth.middleware";
import type { AuthenticatedUser } from "@/shared/types/auth.types";
import type { BookingSocket } from "../socket.types";

const moduleLogger = createModuleLogger("SocketAuthMiddleware");

export type TokenVerifier = (token: string) => Promise<AuthenticatedUser>;

const handshakeToken = (socket: BookingSocket): string | undefined => {
  const { token } = socket.handshake.auth;
  if (typeof token === "string" && token.length > 0) {
    return token;
  }
  return extractBearerToken(socket.handshake.headers.authorization);
};

/** Sockets authenticate with the same bearer token as the HTTP API. */
export const createSocketAuthMiddleware = (verifyToken: TokenVerifier) => {
  return (socket: BookingSocket, next: (err?: Error) => void): void => {
    const token = handshakeToken(socket);

    if (!token) {
      moduleLogger.warn({ socketId: socket.id, ip: socket.handshake.address }, "WebSocket connection without token");
      next(new Error("Authentication token required"));
      return;
    }

    verifyToken(token)
      .then((user) => {
        socket.data.user = user;
        next();
      })
      .catch((error: unknown) => {
        moduleLogger.warn({ socketId: socket.id, error }, "WebSocket authentication failed");
        next(new Error("Authentication failed"));
      });
  };
};

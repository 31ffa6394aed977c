/**
 * Bearer Token Authentication
 *
 * Verifies HS256 access tokens issued by the account subsystem and attaches
 * the caller's Identity to the request. Tokens are never issued here.
 *
 * Only accounts whose status is `active` are admitted; every other outcome
 * answers 401 without saying which check failed.
 */

import { createSecretKey } from "crypto";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import { errors as joseErrors, jwtVerify } from "jose";
import type { Identity } from "../../shared/types";
import { UnauthenticatedError } from "../errors";
import { logger } from "../logger";
import "../middleware/requestContext";
import type { UserDirectory } from "../storage/types";

export interface TokenAuthOptions {
  secret: string;
  users: UserDirectory;
}

/**
 * Verify a bearer token and return its subject (the user id)
 *
 * @throws UnauthenticatedError if the token is invalid, expired, or malformed
 */
export async function verifyAccessToken(token: string, secret: string): Promise<string> {
  const key = createSecretKey(Buffer.from(secret, "utf8"));

  try {
    const { payload } = await jwtVerify(token, key, {
      algorithms: ["HS256"],
    });

    if (!payload.sub || typeof payload.sub !== "string") {
      throw new UnauthenticatedError("Invalid token: missing subject");
    }

    return payload.sub;
  } catch (error) {
    if (error instanceof UnauthenticatedError) throw error;
    if (error instanceof joseErrors.JWTExpired) {
      throw new UnauthenticatedError("Token expired");
    }
    if (error instanceof joseErrors.JWSSignatureVerificationFailed) {
      throw new UnauthenticatedError("Invalid token signature");
    }
    throw new UnauthenticatedError("Invalid token");
  }
}

function readBearerToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (!header) return null;

  const [scheme, token] = header.split(" ");
  if (scheme.toLowerCase() !== "bearer" || !token) return null;
  return token.trim();
}

export function createTokenAuth(options: TokenAuthOptions): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    const token = readBearerToken(req);
    if (!token) {
      return res.status(401).json({ message: "Authentication required" });
    }

    try {
      const userId = await verifyAccessToken(token, options.secret);
      const identity = await options.users.getUser(userId);

      if (!identity || identity.status !== "active") {
        logger.warn("[Auth] Rejected token for inactive or unknown account", { requestId: req.requestId, userId });
        return res.status(401).json({ message: "Authentication required" });
      }

      req.identity = identity;
      next();
    } catch (error) {
      if (error instanceof UnauthenticatedError) {
        logger.debug("[Auth] Token rejected", { requestId: req.requestId, reason: error.message });
        return res.status(401).json({ message: "Authentication required" });
      }
      next(error);
    }
  };
}

/**
 * Identity attached by createTokenAuth
 *
 * @throws UnauthenticatedError when the request skipped authentication
 */
export function requireIdentity(req: Request): Identity {
  if (!req.identity) {
    throw new UnauthenticatedError();
  }
  return req.identity;
}

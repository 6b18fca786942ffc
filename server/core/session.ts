import session from "express-session";
import type { RequestHandler } from "express";
import connectPg from "connect-pg-simple";
import type { OfficeConfig } from "./config";
import { createErrorResponse, logger } from "./logger";
import { getSessionUser } from "../types/session";
import { getErrorMessage } from "../utils/errorUtils";

const SESSION_TTL_MS = 7 * 24 * 60 * 60 * 1000;

export function getSession(cfg: OfficeConfig): RequestHandler {
  const cookieConfig = {
    httpOnly: true,
    secure: cfg.isProduction,
    sameSite: 'lax' as const,
    maxAge: SESSION_TTL_MS,
  };

  const sessionSecret = cfg.sessionSecret;
  if (!sessionSecret) {
    // config refuses to load without a secret in production
    logger.warn('[Session] SESSION_SECRET is missing - using development fallback');
    return session({
      secret: 'dev-only-fallback-secret-' + Date.now(),
      resave: false,
      saveUninitialized: false,
      cookie: cookieConfig,
    });
  }

  if (cfg.storeDriver !== 'postgres' || !cfg.databaseUrl) {
    logger.info('[Session] Using MemoryStore');
    return session({
      secret: sessionSecret,
      resave: false,
      saveUninitialized: false,
      cookie: cookieConfig,
    });
  }

  try {
    const PgStore = connectPg(session);
    const sessionStore = new PgStore({
      conString: cfg.databaseUrl,
      createTableIfMissing: true,
      ttl: SESSION_TTL_MS / 1000,
      tableName: "sessions",
      errorLog: (err: Error) => {
        logger.error('[Session Store] Error:', { extra: { message: err.message } });
      },
    });

    logger.info('[Session] Using Postgres session store');
    return session({
      secret: sessionSecret,
      store: sessionStore,
      resave: false,
      saveUninitialized: false,
      cookie: cookieConfig,
    });
  } catch (err: unknown) {
    logger.warn('[Session] Postgres store failed, using MemoryStore:', { extra: { errorMessage: getErrorMessage(err) } });
    return session({
      secret: sessionSecret,
      resave: false,
      saveUninitialized: false,
      cookie: cookieConfig,
    });
  }
}

export const isAuthenticated: RequestHandler = (req, res, next) => {
  if (!getSessionUser(req)) {
    res.status(401).json(createErrorResponse(req, 'Unauthorized', 'UNAUTHORIZED'));
    return;
  }
  next();
};

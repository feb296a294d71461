import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import {
  AnswerResponseBody,
  AuthErrorKind,
  AuthErrorKindType,
  ChallengeResponseBody,
  CpAuthProtocolError,
  CpAuthValidationError,
  ErrorResponseBody,
  SessionResponseBody,
  bigIntToHex,
  hexToBoundedInteger,
  readStringField,
} from '@cp-auth/core';
import { AuthCoordinator } from '@cp-auth/sdk';

export interface AppOptions {
  coordinator: AuthCoordinator;
  /** Group name reported by /health */
  groupName: string;
  /** Allowed CORS origin (default: *) */
  corsOrigin?: string;
  /** Requests per minute per client on the protocol endpoints (default: 60) */
  apiRateLimit?: number;
  /** Hides messages of unexpected errors when "production" */
  nodeEnv?: string;
  /** Log each request to the console (default: true) */
  logRequests?: boolean;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

export function statusForKind(kind: AuthErrorKindType): { status: number; error: string } {
  switch (kind) {
    case AuthErrorKind.NOT_FOUND:
      return { status: 404, error: 'Not found' };
    case AuthErrorKind.INVALID_ARGUMENT:
      return { status: 400, error: 'Invalid request' };
    case AuthErrorKind.INVALID_PROOF:
      return { status: 401, error: 'Unauthorized' };
    case AuthErrorKind.INTERNAL:
      return { status: 500, error: 'Internal server error' };
    default: {
      const unreachable: never = kind;
      throw new Error(`Unhandled error kind: ${String(unreachable)}`);
    }
  }
}

function sendProtocolError(res: Response, kind: AuthErrorKindType, message: string): void {
  const { status, error } = statusForKind(kind);
  const body: ErrorResponseBody = { error, code: kind, message };
  res.status(status).json(body);
}

function requireString(body: unknown, field: string): string {
  const value = readStringField(body, field);
  if (value === undefined) {
    throw new CpAuthValidationError(`${field} is required and must be a string`, field);
  }
  return value;
}

function readStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    return typeof error.status === 'number' ? error.status : undefined;
  }
  return undefined;
}

// Request logging middleware
function requestLogger(req: Request, res: Response, next: NextFunction) {
  const timestamp = new Date().toISOString();
  console.log(`[${timestamp}] ${req.method} ${req.path}`);
  next();
}

/**
 * Build the HTTP binding of the authentication protocol around a coordinator.
 */
export function createApp(options: AppOptions): express.Express {
  const { coordinator } = options;
  const { p, q } = coordinator.params;
  const production = options.nodeEnv === 'production';

  const app = express();

  const limiter = rateLimit({
    windowMs: 60 * 1000,
    limit: options.apiRateLimit ?? 60,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      error: 'Too many requests',
      code: 'RATE_LIMITED',
      message: 'Too many requests, please try again later.',
    } satisfies ErrorResponseBody,
  });

  // Middleware
  app.use(helmet());
  app.use(cors({ origin: options.corsOrigin ?? '*' }));
  app.use(express.json({ limit: '16kb' }));
  if (options.logRequests ?? true) {
    app.use(requestLogger);
  }

  // Errors from a handler land in the error middleware below
  const route =
    (handler: AsyncHandler) =>
    (req: Request, res: Response, next: NextFunction): void => {
      handler(req, res).catch(next);
    };

  // Health check endpoint
  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      group: options.groupName,
    });
  });

  app.post(
    '/register',
    limiter,
    route(async (req, res) => {
      const body: unknown = req.body;
      const user = requireString(body, 'user');
      const y1 = hexToBoundedInteger(requireString(body, 'y1'), p, 'y1');
      const y2 = hexToBoundedInteger(requireString(body, 'y2'), p, 'y2');

      await coordinator.register(user, y1, y2);
      res.json({});
    }),
  );

  app.post(
    '/challenge',
    limiter,
    route(async (req, res) => {
      const body: unknown = req.body;
      const user = requireString(body, 'user');
      const r1 = hexToBoundedInteger(requireString(body, 'r1'), p, 'r1');
      const r2 = hexToBoundedInteger(requireString(body, 'r2'), p, 'r2');

      const { authId, c } = await coordinator.createChallenge(user, r1, r2);
      const response: ChallengeResponseBody = { authId, c: bigIntToHex(c) };
      res.json(response);
    }),
  );

  app.post(
    '/verify',
    limiter,
    route(async (req, res) => {
      const body: unknown = req.body;
      const authId = requireString(body, 'authId');
      const s = hexToBoundedInteger(requireString(body, 's'), q, 's');

      const { sessionId } = await coordinator.verifyAnswer(authId, s);
      const response: AnswerResponseBody = { sessionId };
      res.json(response);
    }),
  );

  app.get(
    '/session/:sessionId',
    limiter,
    route(async (req, res) => {
      const { sessionId } = req.params;
      const session = await coordinator.resolveSession(sessionId);
      if (!session) {
        sendProtocolError(res, AuthErrorKind.NOT_FOUND, `Session: ${sessionId} not found.`);
        return;
      }
      const response: SessionResponseBody = {
        user: session.identity,
        issuedAt: new Date(session.issuedAtMs).toISOString(),
        expiresAt: new Date(session.expiresAtMs).toISOString(),
      };
      res.json(response);
    }),
  );

  // Error handling middleware
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof CpAuthProtocolError) {
      sendProtocolError(res, err.kind, err.message);
      return;
    }
    if (err instanceof CpAuthValidationError) {
      sendProtocolError(res, AuthErrorKind.INVALID_ARGUMENT, err.message);
      return;
    }

    // body-parser rejections (malformed JSON, oversized body)
    const status = readStatus(err);
    if (status !== undefined && status >= 400 && status < 500) {
      const body: ErrorResponseBody = {
        error: 'Invalid request',
        code: AuthErrorKind.INVALID_ARGUMENT,
        message: status === 413 ? 'Request body too large' : 'Malformed JSON body',
      };
      res.status(status).json(body);
      return;
    }

    console.error('Unhandled error:', err);
    const message = production || !(err instanceof Error) ? 'An error occurred' : err.message;
    sendProtocolError(res, AuthErrorKind.INTERNAL, message);
  });

  return app;
}

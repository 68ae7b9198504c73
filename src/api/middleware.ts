import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError, z } from 'zod';
import { ApiError, NotFoundError, ValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Express 4 does not forward rejected promises to the error middleware.
 */
export function asyncHandler(
    handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
    return (req, res, next) => {
        handler(req, res, next).catch(next);
    };
}

/**
 * One log line per request, written when the response finishes.
 */
export const requestLogger: RequestHandler = (req, res, next) => {
    const startTime = process.hrtime.bigint();

    res.on('finish', () => {
        const durationMs = Number(process.hrtime.bigint() - startTime) / 1e6;
        const context = {
            method: req.method,
            path: req.originalUrl,
            status: res.statusCode,
            durationMs: Math.round(durationMs * 10) / 10,
        };

        const logger = getLogger();
        if (res.statusCode >= 500) logger.error(context, 'Request failed');
        else if (res.statusCode >= 400) logger.warn(context, 'Request rejected');
        else logger.info(context, 'Request completed');
    });

    next();
};

export const notFoundHandler: RequestHandler = (req, _res, next) => {
    next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
};

/**
 * body-parser failures are http-errors carrying a `type`.
 */
const bodyParserErrorSchema = z.object({
    type: z.enum(['entity.parse.failed', 'entity.too.large']),
});

export const errorHandler: ErrorRequestHandler = (error: unknown, _req, res, _next) => {
    if (error instanceof ApiError) {
        res.status(error.status).json({
            error: {
                code: error.code,
                message: error.message,
                ...(error.details !== undefined ? { details: error.details } : {}),
            },
        });
        return;
    }

    if (error instanceof ZodError) {
        res.status(400).json({
            error: {
                code: 'validation_error',
                message: 'Invalid request',
                details: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
            },
        });
        return;
    }

    const bodyError = bodyParserErrorSchema.safeParse(error);
    if (bodyError.success) {
        const tooLarge = bodyError.data.type === 'entity.too.large';
        res.status(tooLarge ? 413 : 400).json({
            error: {
                code: tooLarge ? 'payload_too_large' : 'validation_error',
                message: tooLarge ? 'Request body too large' : 'Malformed JSON body',
            },
        });
        return;
    }

    getLogger().error({ err: error }, 'Unhandled error');
    res.status(500).json({ error: { code: 'internal_error', message: 'Internal server error' } });
};

/**
 * Path ids are positive integers in plain decimal.
 */
const idSchema = z.string().regex(/^[1-9]\d*$/).transform(Number);

export function parseId(req: Request, name: string): number {
    const raw = req.params[name];
    const parsed = idSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ValidationError(`${name} must be a positive integer, got "${raw ?? ''}"`);
    }
    return parsed.data;
}

import { Request, Response } from 'express';

import config from '../../config.js';
import { StakingError, StakingErrorCode } from '../../errors.js';
import logger from '../../logger.js';

/**
 * @apiDefine PaginationParams
 * @apiParam {Number} [limit=10] Number of items to return per page (max: 100)
 * @apiParam {Number} [offset=0] Number of items to skip (for pagination)
 *
 * @apiSuccess {Object[]} data Array of items
 * @apiSuccess {Number} total Total number of items available
 * @apiSuccess {Number} limit Number of items per page
 * @apiSuccess {Number} skip Number of items skipped
 * @apiSuccess {Number} page Current page number
 */

export interface Pagination {
    limit: number;
    skip: number;
    page: number;
}

function queryInteger(value: unknown): number | null {
    if (typeof value !== 'string' || !/^[0-9]+$/.test(value)) return null;
    const parsed = Number(value);
    return Number.isSafeInteger(parsed) ? parsed : null;
}

/**
 * Get pagination parameters from request query
 */
export const getPagination = (query: Request['query']): Pagination => {
    const requested = queryInteger(query.limit);
    const limit = requested && requested > 0 ? Math.min(requested, config.eventsPageMax) : 10;
    const offset = queryInteger(query.offset) ?? 0;
    return {
        limit,
        skip: offset,
        page: Math.floor(offset / limit) + 1,
    };
};

export function paginate<T>(items: T[], pagination: Pagination): { data: T[]; total: number; limit: number; skip: number; page: number } {
    return {
        data: items.slice(pagination.skip, pagination.skip + pagination.limit),
        total: items.length,
        ...pagination,
    };
}

/**
 * Parses a non-negative decimal id from a path or query parameter.
 */
export function parseIdParam(value: unknown): bigint | null {
    if (typeof value !== 'string' || !/^[0-9]{1,78}$/.test(value)) return null;
    return BigInt(value);
}

export function queryString(value: unknown): string | null {
    return typeof value === 'string' && value.length > 0 ? value : null;
}

/**
 * JSON replacer writing bigints as decimal strings.
 */
export function bigintReplacer(_key: string, value: unknown): unknown {
    return typeof value === 'bigint' ? value.toString() : value;
}

export function sendJson(res: Response, body: unknown, status = 200): void {
    res.status(status).type('application/json').send(JSON.stringify(body, bigintReplacer));
}

const STATUS_BY_CODE: Record<StakingErrorCode, number> = {
    InvalidLevel: 400,
    InvalidStakeId: 404,
    InvalidExternalId: 404,
    AlreadyAttached: 409,
    NoActiveStaking: 404,
    TokensStillLocked: 409,
    Unauthorized: 403,
    TransferFailed: 422,
    InvalidTransaction: 400,
    NumericOverflow: 400,
};

export function statusForError(err: unknown): number {
    return err instanceof StakingError ? STATUS_BY_CODE[err.code] : 500;
}

export function sendError(res: Response, err: unknown, context: string): void {
    const status = statusForError(err);
    if (err instanceof StakingError) {
        sendJson(res, { success: false, error: err.code, message: err.message }, status);
        return;
    }
    logger.error(`Error ${context}:`, err);
    sendJson(res, { success: false, error: 'Internal server error' }, status);
}

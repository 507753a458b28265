import { Request, Response, NextFunction } from 'express';
import { randomBytes } from 'crypto';

export const REQUEST_ID_HEADER = 'X-Request-ID';

function generateRequestId(): string {
	return `req-${Date.now()}-${randomBytes(6).toString('hex')}`;
}

/**
 * Reuses the caller's X-Request-ID or creates one, and echoes it on the response.
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
	const incoming = req.get(REQUEST_ID_HEADER)?.trim();
	res.setHeader(REQUEST_ID_HEADER, incoming ? incoming : generateRequestId());
	next();
}

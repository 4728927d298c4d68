import { NextFunction, Request, RequestHandler, Response } from 'express';
import { isRole } from '../core/authorization';
import { Principal } from '../types';

export const PRINCIPAL_HEADERS = {
  userId: 'x-principal-user-id',
  tenantId: 'x-principal-tenant-id',
  role: 'x-principal-role',
} as const;

const MAX_IDENTIFIER_LENGTH = 255;

const principals = new WeakMap<Request, Principal>();

function readIdentifier(req: Request, header: string): string | null {
  const value = req.get(header)?.trim();
  if (!value || value.length > MAX_IDENTIFIER_LENGTH) {
    return null;
  }
  return value;
}

export function principalFromHeaders(req: Request): Principal | null {
  const userId = readIdentifier(req, PRINCIPAL_HEADERS.userId);
  const tenantId = readIdentifier(req, PRINCIPAL_HEADERS.tenantId);
  const role = req.get(PRINCIPAL_HEADERS.role)?.trim().toLowerCase();

  if (!userId || !tenantId || !role || !isRole(role)) {
    return null;
  }

  return { userId, tenantId, role };
}

/**
 * The identity collaborator sits in front of this service and forwards the
 * authenticated caller in trusted headers.
 */
export function createPrincipalMiddleware(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const principal = principalFromHeaders(req);
    if (!principal) {
      res.status(401).json({
        success: false,
        error: 'unauthenticated',
        message: 'Missing or invalid principal headers',
        timestamp: new Date().toISOString(),
      });
      return;
    }

    principals.set(req, principal);
    next();
  };
}

export function principalOf(req: Request): Principal | undefined {
  return principals.get(req);
}

import { AuditEntryRepositoryPort } from '../../../audit/domain/repositories/audit-entry.repository.port';
import { AuthorizationRepositoryPort } from './authorization.repository.port';

/**
 * Repositories bound to one unit of work. Writes made through them commit
 * together or not at all.
 */
export interface AuthorizationWriteScope {
  authorizations: AuthorizationRepositoryPort;
  audit: AuditEntryRepositoryPort;
}

/**
 * Runs a state write and its audit entry atomically. If `work` throws,
 * every write made through the scope is rolled back and the error is
 * rethrown.
 */
export abstract class AuthorizationUnitOfWork {
  abstract run<T>(work: (scope: AuthorizationWriteScope) => Promise<T>): Promise<T>;
}

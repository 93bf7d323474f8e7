import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import {
  AuthorizationUnitOfWork,
  AuthorizationWriteScope,
} from '../../../domain/repositories/authorization-unit-of-work.port';
import { AuthorizationEntity } from './entities/authorization.entity';
import { AuthorizationRelationalRepository } from './repositories/authorization.repository';
import { AuditEntryEntity } from '../../../../audit/infrastructure/persistence/relational/entities/audit-entry.entity';
import { AuditEntryRelationalRepository } from '../../../../audit/infrastructure/persistence/relational/repositories/audit-entry.repository';

@Injectable()
export class AuthorizationRelationalUnitOfWork implements AuthorizationUnitOfWork {
  constructor(private readonly dataSource: DataSource) {}

  async run<T>(work: (scope: AuthorizationWriteScope) => Promise<T>): Promise<T> {
    return this.dataSource.transaction((manager) =>
      work({
        authorizations: new AuthorizationRelationalRepository(
          manager.getRepository(AuthorizationEntity),
        ),
        audit: new AuditEntryRelationalRepository(
          manager.getRepository(AuditEntryEntity),
        ),
      }),
    );
  }
}

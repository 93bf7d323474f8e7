import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PersonEntity } from './infrastructure/persistence/relational/entities/person.entity';
import { PersonRepositoryPort } from './domain/repositories/person.repository.port';
import { PersonRelationalRepository } from './infrastructure/persistence/relational/repositories/person.repository';
import { PeopleService } from './people.service';
import { PeopleController } from './people.controller';
import { AuditModule } from '../audit/audit.module';

@Module({
  imports: [TypeOrmModule.forFeature([PersonEntity]), AuditModule],
  providers: [
    {
      provide: PersonRepositoryPort,
      useClass: PersonRelationalRepository,
    },
    PeopleService,
  ],
  controllers: [PeopleController],
  exports: [PersonRepositoryPort, PeopleService],
})
export class PeopleModule {}

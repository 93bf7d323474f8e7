import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CourseEntity } from './infrastructure/persistence/relational/entities/course.entity';
import { CompletionEntity } from './infrastructure/persistence/relational/entities/completion.entity';
import { CourseRepositoryPort } from './domain/repositories/course.repository.port';
import { CompletionRepositoryPort } from './domain/repositories/completion.repository.port';
import { CourseRelationalRepository } from './infrastructure/persistence/relational/repositories/course.repository';
import { CompletionRelationalRepository } from './infrastructure/persistence/relational/repositories/completion.repository';
import { TrainingDomainService } from './domain/services/training.domain.service';
import { CoursesController } from './courses.controller';
import { CompletionsController } from './completions.controller';
import { PeopleModule } from '../people/people.module';
import { AuditModule } from '../audit/audit.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([CourseEntity, CompletionEntity]),
    PeopleModule,
    AuditModule,
  ],
  providers: [
    {
      provide: CourseRepositoryPort,
      useClass: CourseRelationalRepository,
    },
    {
      provide: CompletionRepositoryPort,
      useClass: CompletionRelationalRepository,
    },
    TrainingDomainService,
  ],
  controllers: [CoursesController, CompletionsController],
  exports: [CourseRepositoryPort, CompletionRepositoryPort, TrainingDomainService],
})
export class TrainingModule {}

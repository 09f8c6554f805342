import { DynamicModule, Module, Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CursorConfig } from '../../config/cursor.config';
import { TaskStore } from '../../config/database.config';
import { Task } from './entities/task.entity';
import { InMemoryTaskReadRepository } from './repositories/in-memory-task-read.repository';
import { TypeormTaskReadRepository } from './repositories/typeorm-task-read.repository';
import { CursorService } from './services/cursor.service';
import { CLOCK, CURSOR_OPTIONS, systemClock, TASK_READ_REPOSITORY } from './tasks.constants';
import { TasksController } from './tasks.controller';
import { TasksService } from './tasks.service';

export interface TasksModuleOptions {
  store: TaskStore;
}

@Module({})
export class TasksModule {
  static register(options: TasksModuleOptions): DynamicModule {
    const common: Provider[] = [
      TasksService,
      CursorService,
      { provide: CLOCK, useValue: systemClock },
      {
        provide: CURSOR_OPTIONS,
        inject: [ConfigService],
        useFactory: (config: ConfigService): CursorConfig => config.getOrThrow<CursorConfig>('cursor'),
      },
    ];

    if (options.store === 'memory') {
      return {
        module: TasksModule,
        controllers: [TasksController],
        providers: [
          ...common,
          InMemoryTaskReadRepository,
          { provide: TASK_READ_REPOSITORY, useExisting: InMemoryTaskReadRepository },
        ],
        exports: [TasksService, InMemoryTaskReadRepository],
      };
    }

    return {
      module: TasksModule,
      imports: [TypeOrmModule.forFeature([Task])],
      controllers: [TasksController],
      providers: [
        ...common,
        TypeormTaskReadRepository,
        { provide: TASK_READ_REPOSITORY, useExisting: TypeormTaskReadRepository },
      ],
      exports: [TasksService],
    };
  }
}

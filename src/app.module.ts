import { DynamicModule, Module, ModuleMetadata } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import cursorConfig from './config/cursor.config';
import databaseConfig, { DatabaseConfig, TaskStore } from './config/database.config';
import { CreateTasksTable1767225600000 } from './database/migrations/1767225600000-CreateTasksTable';
import { Task } from './modules/tasks/entities/task.entity';
import { TasksModule } from './modules/tasks/tasks.module';

export interface AppModuleOptions {
  store: TaskStore;
}

@Module({})
export class AppModule {
  static register(options: AppModuleOptions): DynamicModule {
    const imports: NonNullable<ModuleMetadata['imports']> = [
      // Configuration
      ConfigModule.forRoot({
        isGlobal: true,
        load: [databaseConfig, cursorConfig],
      }),
    ];

    if (options.store === 'postgres') {
      // Database
      imports.push(
        TypeOrmModule.forRootAsync({
          inject: [ConfigService],
          useFactory: (configService: ConfigService) => {
            const database = configService.getOrThrow<DatabaseConfig>('database');
            return {
              type: 'postgres' as const,
              host: database.host,
              port: database.port,
              username: database.username,
              password: database.password,
              database: database.database,
              entities: [Task],
              migrations: [CreateTasksTable1767225600000],
              migrationsRun: !database.synchronize,
              synchronize: database.synchronize,
              logging: database.logging,
            };
          },
        }),
      );
    }

    // Feature modules
    imports.push(TasksModule.register({ store: options.store }));

    return { module: AppModule, imports };
  }
}

import { Test, TestingModule } from '@nestjs/testing';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { AppModule } from '../../src/app.module';
import { DatabaseService } from '../../src/database/database.service';
import { InstanceConfigService } from '../../src/instance-config/instance-config.service';
import { NotificationsRepository } from '../../src/notifications/notifications.repository';

export interface TestContext {
  app: NestFastifyApplication;
  module: TestingModule;
  database: DatabaseService;
  instanceConfig: InstanceConfigService;
  notifications: NotificationsRepository;
}

/**
 * Creates a fully configured test application backed by an in-memory
 * SQLite database (DATABASE_PATH=:memory: in .env.test)
 */
export async function createTestApp(): Promise<TestContext> {
  const moduleFixture = await Test.createTestingModule({
    imports: [AppModule],
  }).compile();

  const app = moduleFixture.createNestApplication<NestFastifyApplication>(
    new FastifyAdapter(),
  );

  app.setGlobalPrefix('api');
  // Note: ZodValidationPipe is already registered globally via APP_PIPE in AppModule

  await app.init();
  await app.getHttpAdapter().getInstance().ready();

  return {
    app,
    module: moduleFixture,
    database: moduleFixture.get(DatabaseService),
    instanceConfig: moduleFixture.get(InstanceConfigService),
    notifications: moduleFixture.get(NotificationsRepository),
  };
}

/**
 * Empties every table and drops the cached instance config
 */
export function resetTestState(context: TestContext): void {
  context.database.cleanDatabase();
  context.instanceConfig.invalidate();
}

/**
 * Closes the test application and cleans up
 */
export async function closeTestApp(context: TestContext | undefined): Promise<void> {
  if (context) {
    await context.app.close();
  }
}

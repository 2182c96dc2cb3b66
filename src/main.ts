import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { createAppContext } from './app.context';
import { DcaService } from './dca/dca.service';
import { describeResult } from './dca/dca.result';

const logger = new Logger('DCA');

// One pass per process run; scheduling belongs to cron or similar.
async function bootstrap() {
  const app = await createAppContext();

  try {
    const result = await app.get(DcaService).handleDcaLogic();
    if (result.ok) {
      logger.log(describeResult(result));
    } else {
      logger.error(describeResult(result));
      process.exitCode = 1;
    }
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  logger.error(
    'DCA run failed',
    error instanceof Error ? error.stack : String(error),
  );
  process.exitCode = 1;
});

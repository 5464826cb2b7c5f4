import 'dotenv/config';
import { scoped } from './logging.js';
import { loadAppConfigFromEnv } from './server/config.js';
import { Registry, waitForShutdown } from './server/Registry.js';
import { valuesOf } from './gateway/arguments.js';
import { EchoArgsSchema } from './schemas/osc.js';

const log = scoped('main');

// Echo loop: every message received on the echo address is sent back after a delay.
async function run(): Promise<void> {
  const config = loadAppConfigFromEnv();
  const registry = new Registry();

  const sendSomething = registry.bindSender(config.target, (text: string) => [
    config.echo.address,
    text,
  ]);

  registry.onReceive(config.listen, config.echo.address, async (address, args) => {
    const [text] = EchoArgsSchema.parse(valuesOf(args));
    log.info({ address, text }, 'I got a message');
    await new Promise((resolve) => setTimeout(resolve, config.echo.delayMs));
    await sendSomething(text);
  });

  const reports = await registry.startAll();
  if (reports.some((r) => !r.ok)) {
    const failed = reports.filter((r) => !r.ok).map((r) => r.endpoint);
    log.warn({ failed }, 'some receivers are not listening');
  }
  await sendSomething('Hey this is something');
  await waitForShutdown();
  await registry.stopAll();
  log.info('stopped');
}

run().catch((err: unknown) => {
  log.error({ err }, 'echo demo failed');
  process.exit(1);
});

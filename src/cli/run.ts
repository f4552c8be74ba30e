/**
 * CLI Runner
 *
 * Resolves configuration and either converts one file or starts the tool
 * server. Returns the process exit code.
 */

import { resolveConfig, type ConfigEnvironment } from '../config/converter-config.js';
import { convertFile } from '../convert/convert-file.js';
import { TeiRenderServer } from '../server/mcp-server.js';
import { toConversionError } from '../shared/errors/index.js';
import { getLogger } from '../shared/services/logging.service.js';
import { parseArgs, USAGE } from './args.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

function registerShutdown(server: TeiRenderServer): void {
  const shutdown = (): void => {
    console.error('Shutting down...');
    server.stop().then(
      () => process.exit(EXIT_SUCCESS),
      (error: unknown) => {
        console.error('Failed to stop server:', error);
        process.exit(EXIT_FAILURE);
      },
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

export async function runCli(
  argv: string[],
  env: ConfigEnvironment = process.env,
): Promise<number> {
  const args = parseArgs(argv);
  if (args.help) {
    console.log(USAGE);
    return EXIT_SUCCESS;
  }

  const logger = getLogger();
  try {
    const config = resolveConfig(
      {
        lineWidth: args.width,
        strict: args.strict || undefined,
        cssPaths: args.css.length > 0 ? args.css : undefined,
        logLevel: args.logLevel,
      },
      env,
    );
    logger.setMinLevel(config.logLevel);

    if (args.serve) {
      const server = new TeiRenderServer();
      await server.start();
      registerShutdown(server);
      return EXIT_SUCCESS;
    }

    const { input, output } = args;
    if (!input || !output) {
      console.error(USAGE);
      return EXIT_USAGE;
    }

    await convertFile({
      inputPath: input,
      outputPath: output,
      lineWidth: config.lineWidth,
      strict: config.strict,
      cssPaths: config.cssPaths,
    });
    return EXIT_SUCCESS;
  } catch (error) {
    const failure = toConversionError(error);
    logger.error(failure.message, failure, { code: failure.code, ...failure.details });
    return EXIT_FAILURE;
  }
}

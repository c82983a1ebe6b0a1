/**
 * Run command.
 *
 *   npx tsx src/main.ts --user <login> [--project <slug>] [--highlight Insecta=#d95f02]
 *
 * See args.ts for every flag.
 */

import { pathToFileURL } from 'node:url';
import { parseArgs } from './args.js';
import { loadConfig } from './config.js';
import { createProductionContainer } from './container.production.js';
import { AppError, errorMessage } from './errors.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';

export async function main(argv: readonly string[], logger?: ILogProvider): Promise<number> {
  let log = logger ?? new ConsoleLogProvider({ outputToConsole: true });

  try {
    const args = parseArgs(argv);
    if (!logger && args.verbose) {
      log = new ConsoleLogProvider({ outputToConsole: true, minLevel: 'debug' });
    }
    const config = loadConfig(args.config);
    const container = createProductionContainer(config, log);
    const result = await container.pipeline.run(args.query);

    console.log(
      `${result.retrieval.records.length} observations → ${result.resolution.taxa.length} taxa → ` +
        `${result.subtree.tree.tipCount} tips (${result.subtree.file})`
    );
    for (const figure of result.figures) console.log(`wrote ${figure.file}`);
    return 0;
  } catch (err) {
    if (err instanceof AppError) {
      log.error(err.message, { code: err.code, ...err.details });
    } else {
      log.error('Unexpected failure', { error: errorMessage(err) });
    }
    return 1;
  } finally {
    await log.flush();
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  process.exitCode = await main(process.argv.slice(2));
}

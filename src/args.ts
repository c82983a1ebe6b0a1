/**
 * Command-line flags for the run command.
 *
 *   --user <id>            iNaturalist user login or id
 *   --project <id>         iNaturalist project slug or id
 *   --iconic-taxon <name>  reserved, accepted but not applied
 *   --out <dir>            output directory [default: output]
 *   --name <base>          figure/tree file base name [default: tree]
 *   --highlight <L=#hex>   colour the clade labelled L (repeatable)
 *   --format <svg|png>     figure format (repeatable) [default: svg and png]
 *   --collapse-singles     drop single-child nodes after parsing
 *   --strict / --lenient   fail, or not, when no observation page succeeds
 *   --verbose              log each page request
 */

import { InvalidArgumentError } from './errors.js';
import { DEFAULTS, type PipelineConfigInput } from './config.js';
import type { ObservationQuery } from './types/models.js';

export interface CliArgs {
  query: ObservationQuery;
  config: PipelineConfigInput;
  verbose: boolean;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const query: ObservationQuery = {};
  const highlights: Record<string, string> = {};
  const formats: Array<'svg' | 'png'> = [];
  let outDir: string | undefined;
  let name: string | undefined;
  let collapseSingles: boolean | undefined;
  let strict: boolean | undefined;
  let verbose = false;

  const value = (i: number, flag: string): string => {
    const v = argv[i];
    if (v === undefined || v.startsWith('--')) {
      throw new InvalidArgumentError(`${flag} needs a value`);
    }
    return v;
  };

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    switch (flag) {
      case '--user':
        query.userId = value(++i, flag);
        break;
      case '--project':
        query.projectId = value(++i, flag);
        break;
      case '--iconic-taxon':
        query.iconicTaxon = value(++i, flag);
        break;
      case '--out':
        outDir = value(++i, flag);
        break;
      case '--name':
        name = value(++i, flag);
        break;
      case '--highlight': {
        const spec = value(++i, flag);
        const eq = spec.indexOf('=');
        if (eq <= 0 || eq === spec.length - 1) {
          throw new InvalidArgumentError(`--highlight expects Label=colour, got "${spec}"`);
        }
        highlights[spec.slice(0, eq)] = spec.slice(eq + 1);
        break;
      }
      case '--format': {
        const fmt = value(++i, flag).toLowerCase();
        if (fmt !== 'svg' && fmt !== 'png') {
          throw new InvalidArgumentError(`--format must be svg or png, got "${fmt}"`);
        }
        if (!formats.includes(fmt)) formats.push(fmt);
        break;
      }
      case '--collapse-singles':
        collapseSingles = true;
        break;
      case '--strict':
        strict = true;
        break;
      case '--lenient':
        strict = false;
        break;
      case '--verbose':
        verbose = true;
        break;
      default:
        throw new InvalidArgumentError(`Unknown argument "${flag}"`);
    }
  }

  const render = {
    ...(outDir !== undefined && { outDir }),
    ...(name !== undefined && { name }),
    ...(formats.length > 0 && { formats }),
    ...(Object.keys(highlights).length > 0 && { highlights }),
  };

  const config: PipelineConfigInput = {
    ...(strict !== undefined && { retrieval: { strict } }),
    subtree: {
      ...(collapseSingles !== undefined && { collapseSingles }),
      ...((outDir !== undefined || name !== undefined) && {
        treeFile: `${outDir ?? DEFAULTS.render.outDir}/${name ?? DEFAULTS.render.name}.tre`,
      }),
    },
    render,
  };

  return { query, config, verbose };
}

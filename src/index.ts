import { Command } from 'commander';
import { writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { planTrip } from './app/planTrip';
import { parseGapPolicy } from './config';
import { describeError } from './errors';
import { emitCsv } from './io/emitCsv';
import { emitKml } from './io/emitKml';
import { emitHtml } from './io/emitHtml';
import { loadStations } from './io/parse';
import { StationCatalog } from './catalog';
import { formatPlace } from './places';
import { formatTimestampToken } from './time';
import type { GapPolicy } from './types';
import type { ProgressFn } from './planner';

interface PlanCliOptions {
  stations: string;
  route?: string;
  from?: string;
  to?: string;
  config?: string;
  range?: number;
  mpg?: number;
  fallbackPrice?: number;
  proximity?: number;
  gapPolicy?: GapPolicy;
  verbose?: boolean;
  progress?: boolean;
  markdown?: boolean;
  out?: string;
  csv?: string;
  kml?: string | boolean;
  html?: string | boolean;
}

interface LocationsCliOptions {
  stations: string;
}

const progressLogger: ProgressFn = (stop, index) => {
  console.log(
    `progress stop=${index + 1} mile=${stop.milesFromOrigin.toFixed(1)} leg=${stop.legMiles.toFixed(
      1,
    )} gallons=${stop.fuelGallons.toFixed(2)} cost=${stop.cost.toFixed(2)}`,
  );
};

function writeOutput(path: string, content: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content, 'utf8');
  console.log(`Wrote ${path}`);
}

function fail(err: unknown): void {
  console.error(describeError(err));
  process.exitCode = 1;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('fuelstop')
    .description('Plan fuel stops along a driving route')
    .version('0.1.0')
    .showHelpAfterError();

  program
    .command('plan', { isDefault: true })
    .requiredOption('--stations <file>', 'Path to fuel station CSV')
    .option('--route <file>', 'Path to route JSON (distance + waypoints or polyline)')
    .option('--from <location>', 'Origin (lat,lon or place name)')
    .option('--to <location>', 'Destination (lat,lon or place name)')
    .option('--config <file>', 'Path to planner config JSON')
    .option('--range <miles>', 'Vehicle range in miles', parseFloat)
    .option('--mpg <mpg>', 'Fuel economy in miles per gallon', parseFloat)
    .option('--fallback-price <usd>', 'Price per gallon for stations without one', parseFloat)
    .option('--proximity <miles>', 'Prefilter distance from route in miles', parseFloat)
    .option(
      '--gap-policy <policy>',
      'What to do when no station is in range mid-route (truncate|fail)',
      parseGapPolicy,
    )
    .option('--verbose', 'Print planner steps')
    .option('--progress', 'Print each stop as it is chosen')
    .option('--markdown', 'Print a Markdown summary')
    .option('--out <file>', 'Write plan JSON to this path (overwrite)')
    .option('--csv <file>', 'Write fuel stops CSV to this path')
    .option('--kml [file]', 'Write KML to this path (or stdout)')
    .option('--html [file]', 'Write HTML plan to this path (or stdout)')
    .action(async (opts: PlanCliOptions) => {
      try {
        const result = await planTrip({
          stationsPath: opts.stations,
          routePath: opts.route,
          from: opts.from,
          to: opts.to,
          configPath: opts.config,
          overrides: {
            vehicleRangeMiles: opts.range,
            milesPerGallon: opts.mpg,
            fallbackPricePerGallon: opts.fallbackPrice,
            prefilterProximityMiles: opts.proximity,
            gapPolicy: opts.gapPolicy,
          },
          markdown: opts.markdown,
          verbose: opts.verbose,
          progress: opts.progress ? progressLogger : undefined,
        });

        const tsToken = formatTimestampToken(result.runTimestamp);
        const tokenize = (s: string): string => s.replace(/\$\{timestamp\}/g, tsToken);

        if (opts.out) {
          writeOutput(tokenize(opts.out), result.json);
        }
        if (opts.csv) {
          writeOutput(tokenize(opts.csv), emitCsv(result.plan, result.runTimestamp));
        }
        if (opts.kml !== undefined) {
          const kml = emitKml(result.plan, result.route.waypoints);
          if (typeof opts.kml === 'string') {
            writeOutput(tokenize(opts.kml), kml);
          } else {
            console.log(kml);
          }
        }
        if (opts.html !== undefined) {
          const html = emitHtml(result.plan);
          if (typeof opts.html === 'string') {
            writeOutput(tokenize(opts.html), html);
          } else {
            console.log(html);
          }
        }
        if (result.markdown) {
          console.log(result.markdown);
        }

        console.log(result.json);
      } catch (err) {
        fail(err);
      }
    });

  program
    .command('locations')
    .description('List the cities that have fuel stations')
    .requiredOption('--stations <file>', 'Path to fuel station CSV')
    .action((opts: LocationsCliOptions) => {
      try {
        const catalog = StationCatalog.fromStations(loadStations(opts.stations));
        for (const place of catalog.locations()) {
          console.log(formatPlace(place));
        }
      } catch (err) {
        fail(err);
      }
    });

  return program;
}

/** Parse and execute with a fresh program so option values never leak between runs. */
export async function run(argv: readonly string[] = process.argv): Promise<Command> {
  return createProgram().parseAsync([...argv]);
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  run().catch(fail);
}

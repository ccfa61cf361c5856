import dotenv from 'dotenv';
dotenv.config({ path: '.env.local', override: false });
dotenv.config({ path: '.env', override: false });

import { readFileSync } from 'fs';
import { formatReportLines } from '@/lib/weather/consoleReport';
import { parseWeatherCsv } from '@/lib/weather/csv';
import { createSampleTable } from '@/lib/weather/sample';
import { analyzeWeatherTable } from '@/modules/weatherAnalysis/service';
import type { WeatherTable } from '@/modules/weatherTable/types';

type Args = { file?: string; sample?: string };

function parseArgs(argv: string[]): Args {
  const args: Args = {};
  for (let i = 2; i < argv.length; i++) {
    const flag = argv[i];
    if (flag === '--file') args.file = argv[++i] ?? '';
    else if (flag === '--sample') args.sample = argv[i + 1] && !argv[i + 1].startsWith('--') ? argv[++i] : '365';
  }
  return args;
}

function usage() {
  console.log(`
Usage:
  npm run weather:analyze -- --file ./weather_data.csv
  npm run weather:analyze -- --sample [days]

Expected CSV header: date,temperature,precipitation,wind_speed,pressure[,...]
`);
}

async function main() {
  const args = parseArgs(process.argv);

  let table: WeatherTable;
  if (args.file) {
    const { table: parsed, warnings } = parseWeatherCsv(readFileSync(args.file, 'utf8'));
    for (const w of warnings) console.warn(`[weather/analyze] ${w}`);
    table = parsed;
  } else if (args.sample) {
    table = createSampleTable({ days: Number(args.sample) || 365 });
  } else {
    usage();
    process.exit(2);
  }

  const report = analyzeWeatherTable(table);
  for (const line of formatReportLines(report)) console.log(line);
}

main().catch((err) => {
  console.error('FATAL:', err instanceof Error ? err.message : err);
  process.exit(1);
});

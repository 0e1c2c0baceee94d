/**
 * Group a sheet by key columns and write the merged workbook + JSON document.
 * Usage: npx tsx scripts/merge-excel.ts <input.xlsx> --config merge.config.json [--out-dir dir]
 */

import fs from 'fs/promises';
import path from 'path';
import { pathToFileURL } from 'url';
import { parseArgs } from 'node:util';
import { loadConfigFile } from '@/lib/config/validator';
import { listSheetNames, processWorkbook } from '@/lib/excel';

const USAGE = `Usage: merge-excel <input> --config <file> [options]

Options:
  -c, --config <file>     grouping configuration (JSON)
  -o, --out-dir <dir>     output directory (default: the input's directory)
  -s, --sheet <name>      sheet to read (overrides config sheetName)
      --header-row <n>    1-based header row (overrides config headerRow)
      --list-sheets       print the workbook's sheet names and exit
  -h, --help              show this help`;

/**
 * Output paths for an input file
 */
export function outputPaths(inputPath: string, outDir?: string) {
  const dir = outDir ?? path.dirname(inputPath);
  const base = path.basename(inputPath, path.extname(inputPath));
  return {
    xlsxPath: path.join(dir, `${base}_merged.xlsx`),
    jsonPath: path.join(dir, `${base}_data.json`),
  };
}

function parseCliArgs(argv: string[]) {
  // drop the "--" separator that npm run forwards
  return parseArgs({
    args: argv.filter((arg) => arg !== '--'),
    options: {
      config: { type: 'string', short: 'c' },
      'out-dir': { type: 'string', short: 'o' },
      sheet: { type: 'string', short: 's' },
      'header-row': { type: 'string' },
      'list-sheets': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
    allowPositionals: true,
  });
}

/**
 * Run the CLI and return its exit code
 */
export async function runCli(argv: string[]): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error(`[CLI] ${message}\n\n${USAGE}`);
    return 1;
  }

  const { values, positionals } = parsed;

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const inputPath = positionals[0];
  if (!inputPath) {
    console.error(`[CLI] No input file given\n\n${USAGE}`);
    return 1;
  }

  try {
    const buffer = await fs.readFile(inputPath);

    if (values['list-sheets']) {
      for (const name of listSheetNames(buffer)) {
        console.log(name);
      }
      return 0;
    }

    if (!values.config) {
      console.error(`[CLI] --config is required\n\n${USAGE}`);
      return 1;
    }

    const config = await loadConfigFile(values.config);

    const headerRowFlag = values['header-row'];
    let headerRow = config.headerRow;
    if (headerRowFlag !== undefined) {
      headerRow = Number(headerRowFlag);
      if (!Number.isInteger(headerRow) || headerRow < 1) {
        console.error(`[CLI] --header-row must be a positive integer, got "${headerRowFlag}"`);
        return 1;
      }
    }

    const result = await processWorkbook(buffer, path.basename(inputPath), {
      ...config,
      sheetName: values.sheet ?? config.sheetName,
      headerRow,
    });

    const { xlsxPath, jsonPath } = outputPaths(inputPath, values['out-dir']);
    await fs.mkdir(path.dirname(xlsxPath), { recursive: true });
    await fs.writeFile(xlsxPath, result.xlsx);
    await fs.writeFile(jsonPath, result.json, 'utf-8');

    console.log(`[CLI] Run ${result.runId} complete`);
    console.log(`[CLI] Workbook saved to: ${xlsxPath}`);
    console.log(`[CLI] JSON saved to: ${jsonPath}`);
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error(`[CLI] Failed to process ${inputPath}: ${message}`);
    return 1;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error('[CLI] Unexpected error:', error);
      process.exitCode = 1;
    }
  );
}

import { Command } from 'commander';
import { readFile, writeFile } from 'fs/promises';
import {
  TfmapError,
  ErrorCode,
  buildDiagramFromText,
  defaultDiagramLogger,
  validate,
} from '@tfmap/core';
import type { DiagramCell } from '@tfmap/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { DiagramOptionsSchema } from '../utils/command-schemas.js';
import { Logger, formatJson } from '../utils/cli-helpers.js';

/**
 * Build diagram cells from a file holding extraction output: bare JSON, or
 * model text with a JSON object somewhere inside it.
 */
export async function buildCellsFromFile(file: string): Promise<DiagramCell[]> {
  let text: string;
  try {
    text = await readFile(file, 'utf-8');
  } catch (error) {
    throw new TfmapError(
      `Cannot read ${file}`,
      ErrorCode.IO_FILE_NOT_FOUND,
      `Input file could not be read: ${file}`,
      { file, originalError: error instanceof Error ? error.message : String(error) }
    );
  }
  const result = buildDiagramFromText(text, { logger: defaultDiagramLogger });
  if (!result.ok) {
    throw new TfmapError(result.reason, ErrorCode.DIAGRAM_NO_DATA, result.reason, { file });
  }
  return result.cells;
}

export function createDiagramCommand(): Command {
  return new Command('diagram')
    .description('Build data flow diagram cells offline from a components/flows JSON file')
    .argument('<file>', 'JSON or model output containing components and flows')
    .option('--output <path>', 'Write the cells to a file instead of stdout')
    .action(async (file: string, options: unknown) => {
      try {
        const validated = validate(DiagramOptionsSchema, options, 'command options');
        const cells = await buildCellsFromFile(file);
        const json = formatJson(cells);
        if (validated.output) {
          await writeFile(validated.output, json + '\n', 'utf-8');
          Logger.success(`Wrote ${String(cells.length)} cells to ${validated.output}`);
        } else {
          console.log(json);
        }
      } catch (error) {
        ErrorHandler.handleCliError(error);
      }
    });
}

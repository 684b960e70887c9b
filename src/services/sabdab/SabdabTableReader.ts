/**
 * @fileoverview Reads a SAbDab summary TSV into validated batch entries.
 * Rows are converted to typed chain assignments here; nothing downstream looks at
 * raw row fields.
 * @module src/services/sabdab/SabdabTableReader
 */
import { createReadStream } from 'node:fs';
import { access } from 'node:fs/promises';

import csv from 'csv-parser';
import { injectable } from 'tsyringe';
import { z } from 'zod';

import {
  createChainAssignment,
  isValidPdbId,
  normalizePdbId,
  parseChainIds,
} from '@/services/structure/chainAssignment.js';
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { logger, type RequestContext } from '@/utils/index.js';
import { REQUIRED_COLUMNS, type RejectedRow, type SabdabTable } from './types.js';

const SabdabRowSchema = z
  .object({
    pdb: z.string().default(''),
    Hchain: z.string().default(''),
    Lchain: z.string().default(''),
    antigen_chain: z.string().default(''),
  })
  .passthrough();

type SabdabRow = z.infer<typeof SabdabRowSchema>;

/**
 * Normalizes a single chain id field: trimmed, upper case, `NA` means absent.
 */
export function normalizeChainId(field: string): string {
  const id = field.trim().toUpperCase();
  return id === 'NA' ? '' : id;
}

/**
 * Converts one row. Heavy then light chain form the antibody side; the antigen
 * field may list several chains separated by `|`.
 */
export function convertRow(
  row: SabdabRow,
  rowNumber: number,
): { ok: true; entry: SabdabTable['entries'][number] } | { ok: false; rejected: RejectedRow } {
  const rawId = row.pdb.trim();
  if (!isValidPdbId(rawId)) {
    return {
      ok: false,
      rejected: {
        rowNumber,
        pdbId: rawId,
        reason: 'InvalidIdentifier',
        detail: `"${rawId}" is not a 4-character PDB identifier`,
      },
    };
  }

  const pdbId = normalizePdbId(rawId);
  const antibody = [normalizeChainId(row.Hchain), normalizeChainId(row.Lchain)].filter(Boolean);
  const antigen = parseChainIds(row.antigen_chain).map((id) => id.toUpperCase());

  const assignment = createChainAssignment(antigen, antibody);
  if (!assignment.ok) {
    return {
      ok: false,
      rejected: {
        rowNumber,
        pdbId,
        reason: assignment.error.reason,
        detail: assignment.error.detail,
      },
    };
  }

  return { ok: true, entry: { pdbId, assignment: assignment.value } };
}

@injectable()
export class SabdabTableReader {
  /**
   * Reads a tab-separated SAbDab summary file.
   * @throws {McpError} `NotFound` if the file does not exist,
   *   `ValidationError` if required columns are missing
   */
  async read(path: string, context: RequestContext): Promise<SabdabTable> {
    try {
      await access(path);
    } catch {
      throw new McpError(JsonRpcErrorCode.NotFound, `SAbDab file not found: ${path}`, {
        path,
      });
    }

    let headers: string[] | undefined;
    const parser = createReadStream(path).pipe(
      csv({ separator: '\t', mapHeaders: ({ header }) => header.trim() }),
    );
    parser.on('headers', (names: string[]) => {
      headers = names;
    });

    const table: SabdabTable = { totalRows: 0, entries: [], rejected: [] };
    for await (const record of parser) {
      const row: unknown = record;
      if (table.totalRows === 0) this.checkColumns(headers, path);
      table.totalRows++;

      const parsed = SabdabRowSchema.safeParse(row);
      if (!parsed.success) {
        table.rejected.push({
          rowNumber: table.totalRows + 1,
          pdbId: '',
          reason: 'MalformedRow',
          detail: parsed.error.issues.map((issue) => issue.message).join('; '),
        });
        continue;
      }

      const converted = convertRow(parsed.data, table.totalRows + 1);
      if (converted.ok) {
        table.entries.push(converted.entry);
      } else {
        table.rejected.push(converted.rejected);
      }
    }
    if (table.totalRows === 0) this.checkColumns(headers, path);

    logger.info('Read SAbDab table', {
      ...context,
      path,
      totalRows: table.totalRows,
      validEntries: table.entries.length,
      rejectedRows: table.rejected.length,
    });
    if (table.rejected.length > 0) {
      logger.debug('Rejected SAbDab rows', { ...context, rejected: table.rejected });
    }

    return table;
  }

  private checkColumns(headers: string[] | undefined, path: string): void {
    const missing = REQUIRED_COLUMNS.filter((column) => !headers?.includes(column));
    if (missing.length > 0) {
      throw new McpError(
        JsonRpcErrorCode.ValidationError,
        `SAbDab file ${path} is missing columns: ${missing.join(', ')}`,
        { path, missing },
      );
    }
  }
}

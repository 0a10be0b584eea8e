import * as fs from 'fs';
import { parse } from 'csv-parse';
import type { Readable } from 'stream';
import { describeError, EtlError, MalformedSourceError, SourceUnavailableError } from '../core/errors';
import type { RawChunk, RawColumn } from '../core/types';
import { pickRawFields, resolveHeader } from './columns';

/** A CSV file path, or an already-open stream of CSV text. */
export type ChunkSource = string | Readable;

export interface ChunkReaderOptions {
  chunkSize: number;
  /** Data rows to skip before the first chunk, for restarting a run part-way. */
  startOffset?: number;
  /** Required columns the source may omit (e.g. fare when it is estimated). */
  optionalColumns?: readonly RawColumn[];
}

export function describeSource(source: ChunkSource): string {
  return typeof source === 'string' ? source : '<stream>';
}

async function openSource(source: ChunkSource): Promise<Readable> {
  if (typeof source !== 'string') return source;

  let stat: fs.Stats;
  try {
    await fs.promises.access(source, fs.constants.R_OK);
    stat = await fs.promises.stat(source);
  } catch (error) {
    throw new SourceUnavailableError(source, error);
  }
  if (!stat.isFile()) {
    throw new SourceUnavailableError(source);
  }
  if (stat.size === 0) {
    throw new MalformedSourceError(`Input file is empty: ${source}`);
  }
  return fs.createReadStream(source);
}

/**
 * Streams the source as consecutive chunks of at most `chunkSize` raw rows.
 * Only the chunk being assembled is held in memory; the parser is paused
 * while the consumer works on a yielded chunk.
 */
export async function* readChunks(source: ChunkSource, options: ChunkReaderOptions): AsyncGenerator<RawChunk> {
  const { chunkSize, startOffset = 0, optionalColumns = [] } = options;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }

  const input = await openSource(source);
  const label = describeSource(source);

  const state: { headerSeen: boolean; headerError: MalformedSourceError | null; inputError: unknown } = {
    headerSeen: false,
    headerError: null,
    inputError: null,
  };

  const parser = parse({
    bom: true,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true,
    columns: (header: string[]) => {
      state.headerSeen = true;
      const resolved = resolveHeader(header, optionalColumns);
      if (resolved.missing.length > 0) {
        state.headerError = new MalformedSourceError(
          `Header of ${label} is missing required column(s): ${resolved.missing.join(', ')}`
        );
        throw state.headerError;
      }
      return resolved.columns;
    },
  });

  input.on('error', (error) => {
    state.inputError = error;
    parser.destroy(error);
  });
  input.pipe(parser);

  let rowNumber = 0;
  let index = 0;
  let rows: RawChunk['rows'] = [];
  let startRow = startOffset + 1;

  try {
    for await (const record of parser) {
      rowNumber++;
      if (rowNumber <= startOffset) continue;

      rows.push(pickRawFields(record));
      if (rows.length === chunkSize) {
        yield { index: index++, startRow, rows };
        startRow += rows.length;
        rows = [];
      }
    }
  } catch (error) {
    if (state.headerError) throw state.headerError;
    if (state.inputError) throw new SourceUnavailableError(label, state.inputError);
    if (error instanceof EtlError) throw error;
    const { message } = describeError(error);
    throw new MalformedSourceError(`Cannot parse ${label} after row ${rowNumber}: ${message}`, error);
  } finally {
    input.unpipe(parser);
    if (typeof source === 'string') input.destroy();
  }

  if (!state.headerSeen) {
    throw new MalformedSourceError(`${label} has no header row`);
  }
  if (rows.length > 0) {
    yield { index, startRow, rows };
  }
}

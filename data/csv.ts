/**
 * CSV price loading
 * Header names are matched case-insensitively; the time column may be called
 * date, datetime, timestamp or time.
 */

import * as fs from 'fs';
import { Bar, PRICE_FIELDS } from '../spec/types';
import { StrategyValidationError } from '../compiler/errors';
import { LoggerFactory } from '../logging/logger';
import { validateBars } from './bars';

const TIME_COLUMNS = ['date', 'datetime', 'timestamp', 'time'];

function splitRow(line: string): string[] {
  return line.split(',').map((cell) => cell.trim().replace(/^"(.*)"$/, '$1'));
}

export function parseTimestamp(raw: string, line: number): number {
  const value = /^-?\d+(\.\d+)?$/.test(raw) ? Number(raw) : Date.parse(raw);
  if (!Number.isFinite(value)) {
    throw new StrategyValidationError(`Invalid timestamp at line ${line}: "${raw}"`, raw);
  }
  return value;
}

/**
 * Parse OHLCV rows. Rows holding "null" cells (common in exported quote
 * data) are skipped; any other non-numeric cell is an error.
 */
export function parseBarsCsv(text: string): Bar[] {
  const lines = text.split(/\r?\n/);
  const headerIndex = lines.findIndex((line) => line.trim() !== '');
  if (headerIndex === -1) {
    throw new StrategyValidationError('CSV input is empty');
  }

  const header = splitRow(lines[headerIndex]).map((name) => name.toLowerCase());
  const timeColumn = header.findIndex((name) => TIME_COLUMNS.includes(name));
  if (timeColumn === -1) {
    throw new StrategyValidationError(
      `Missing time column. Found columns: ${header.join(', ')}`,
      null,
      TIME_COLUMNS
    );
  }

  const columns = PRICE_FIELDS.map((field) => {
    const index = header.indexOf(field);
    if (index === -1) {
      throw new StrategyValidationError(
        `Missing column: ${field}. Found columns: ${header.join(', ')}`,
        field,
        PRICE_FIELDS
      );
    }
    return { field, index };
  });

  const bars: Bar[] = [];
  let skipped = 0;

  for (let i = headerIndex + 1; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    const cells = splitRow(line);
    const lineNumber = i + 1;
    if (columns.some(({ index }) => cells[index] === 'null')) {
      skipped++;
      continue;
    }

    const bar: Bar = {
      timestamp: parseTimestamp(cells[timeColumn] ?? '', lineNumber),
      open: 0,
      high: 0,
      low: 0,
      close: 0,
      volume: 0,
    };
    for (const { field, index } of columns) {
      const raw = cells[index] ?? '';
      const value = raw === '' ? NaN : Number(raw);
      if (!Number.isFinite(value)) {
        throw new StrategyValidationError(`Invalid ${field} at line ${lineNumber}: "${raw}"`, raw);
      }
      bar[field] = value;
    }
    bars.push(bar);
  }

  if (skipped > 0) {
    LoggerFactory.getLogger('PriceCsv').warn('Skipped rows with missing prices', { skipped });
  }

  validateBars(bars);
  return bars;
}

export function loadBarsCsv(filePath: string): Bar[] {
  return parseBarsCsv(fs.readFileSync(filePath, 'utf-8'));
}

import { mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import type { CellValue, ResultRow } from './coerce';
import type { DashboardDocument } from './dataset-builder';

/**
 * Write the dashboard document as pretty-printed JSON.
 * I/O errors are not caught: a failed write fails the run.
 */
export function writeDashboardData(path: string, document: DashboardDocument): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(document, null, 2) + '\n', 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCellValue(value: unknown): value is CellValue {
  return value === null || typeof value === 'number' || typeof value === 'string';
}

function isResultRow(value: unknown): value is ResultRow {
  return isRecord(value) && Object.values(value).every(isCellValue);
}

export function readDashboardData(path: string): DashboardDocument {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (!isRecord(parsed)) {
    throw new Error(`${path}: expected a JSON object of datasets`);
  }

  const document: DashboardDocument = {};
  for (const [name, dataset] of Object.entries(parsed)) {
    if (!Array.isArray(dataset) || !dataset.every(isResultRow)) {
      throw new Error(`${path}: dataset "${name}" must be an array of row objects`);
    }
    document[name] = dataset;
  }
  return document;
}

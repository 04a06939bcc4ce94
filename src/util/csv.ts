/**
 * CSV and JSON export utilities
 */

import { stringify } from 'csv-stringify';
import type { StoredBusiness } from '../types.js';
import { BUSINESS_COLUMNS } from '../storage/rows.js';

export interface CsvExportOptions {
  headers?: boolean;
  delimiter?: string;
  quote?: string;
}

/**
 * Convert stored businesses to CSV, one column per persisted field
 */
export async function businessesToCSV(
  rows: readonly StoredBusiness[],
  options: CsvExportOptions = {}
): Promise<string> {
  const {
    headers = true,
    delimiter = ',',
    quote = '"',
  } = options;

  return new Promise((resolve, reject) => {
    stringify([...rows], {
      header: headers,
      columns: [...BUSINESS_COLUMNS],
      delimiter,
      quote,
    }, (err, output) => {
      if (err) {
        reject(err);
      } else {
        resolve(output);
      }
    });
  });
}

/**
 * Pretty JSON array of stored businesses
 */
export function businessesToJSON(rows: readonly StoredBusiness[]): string {
  return `${JSON.stringify(rows, null, 2)}\n`;
}

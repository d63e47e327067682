import { Injectable, Logger } from '@nestjs/common';
import { parseString, writeToString } from 'fast-csv';
import { InputError } from '../common/errors/input.error';
import {
  COMPANY_FIELDS,
  EnrichmentRecord,
} from '../enrichment/interfaces/enrichment-record.interface';

export const COMPANY_NAME_COLUMN = 'company_name';

export const OUTPUT_COLUMNS = [
  COMPANY_NAME_COLUMN,
  ...COMPANY_FIELDS,
  'status',
  'error_message',
];

const SAMPLE_COMPANIES = ['OpenAI', 'DeepMind', 'Zoho', 'Freshworks', 'Stripe'];

function normalizeHeader(header: string): string {
  return header.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

@Injectable()
export class CsvService {
  private readonly logger = new Logger(CsvService.name);

  /**
   * Reads the `company_name` column of an uploaded CSV. Blank names are
   * skipped; duplicates are kept in file order.
   */
  async parseCompanyNames(content: string | Buffer): Promise<string[]> {
    const raw = typeof content === 'string' ? content : content.toString('utf8');
    const text = raw.replace(/^\uFEFF/, '');
    const rows = await this.readRows(text);

    const [headers, ...dataRows] = rows;
    if (!headers) {
      throw new InputError('The CSV file is empty');
    }

    const columnIndex = headers.findIndex(
      (header) => normalizeHeader(header) === COMPANY_NAME_COLUMN,
    );
    if (columnIndex === -1) {
      throw new InputError(
        `CSV must contain a '${COMPANY_NAME_COLUMN}' column (found: ${headers.join(', ') || 'none'})`,
      );
    }

    const names = dataRows
      .map((row) => (row[columnIndex] ?? '').trim())
      .filter((name) => name.length > 0);

    if (names.length === 0) {
      throw new InputError('No valid company names found after cleaning');
    }

    this.logger.log(
      `Parsed ${names.length} company names from ${dataRows.length} rows`,
    );
    return names;
  }

  toCsv(records: readonly EnrichmentRecord[]): Promise<string> {
    const rows = records.map((record) => [
      record.company_name,
      ...COMPANY_FIELDS.map((field) => record[field]),
      record.status,
      record.error_message,
    ]);
    return writeToString(rows, { headers: OUTPUT_COLUMNS });
  }

  sampleCsv(): string {
    return [COMPANY_NAME_COLUMN, ...SAMPLE_COMPANIES].join('\n') + '\n';
  }

  private readRows(text: string): Promise<string[][]> {
    return new Promise((resolve, reject) => {
      const rows: string[][] = [];
      parseString<string[], string[]>(text, {
        headers: false,
        ignoreEmpty: true,
        trim: true,
      })
        .on('error', (error: Error) =>
          reject(new InputError(`Could not read CSV: ${error.message}`)),
        )
        .on('data', (row: string[]) => rows.push(row))
        .on('end', () => resolve(rows));
    });
  }
}

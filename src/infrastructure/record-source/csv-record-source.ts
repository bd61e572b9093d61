import { Injectable } from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import Papa from 'papaparse';
import type { IRecordSource } from '../../domain/ports/record-source.interface';
import type { UserRecord } from '../../domain/models/user-record.model';
import { SourceReadError } from '../../domain/errors/provisioning-errors';
import { ProvisioningLogger } from '../../modules/logging/provisioning-logger.service';
import { LogCategory } from '../../modules/logging/log-levels';

type UserField = Exclude<keyof UserRecord, 'rowNumber'>;

/**
 * Column labels of the onboarding sheet. Labels with spaces are display
 * labels, matched case-insensitively after trimming.
 */
export const CSV_COLUMNS: Readonly<Record<UserField, string>> = {
  displayName: 'DisplayName',
  userPrincipalName: 'UserPrincipalName',
  password: 'Password',
  givenName: 'First Name',
  surname: 'Last Name',
  jobTitle: 'Job title',
  department: 'Department',
  usageLocation: 'Usage location',
  state: 'State',
  country: 'Country',
  officeLocation: 'Office Location',
  city: 'City',
  postalCode: 'Postal Code',
};

export const REQUIRED_FIELDS: readonly UserField[] = ['displayName', 'userPrincipalName', 'password'];

const USER_FIELDS: readonly UserField[] = [
  'displayName',
  'userPrincipalName',
  'password',
  'givenName',
  'surname',
  'jobTitle',
  'department',
  'usageLocation',
  'state',
  'country',
  'officeLocation',
  'city',
  'postalCode',
];

/**
 * CsvRecordSource — reads the whole input file into UserRecords, in file order.
 *
 * Values are trimmed and otherwise passed through; format validation is left
 * to the identity service.
 */
@Injectable()
export class CsvRecordSource implements IRecordSource {
  constructor(private readonly logger: ProvisioningLogger) {}

  async parse(path: string): Promise<UserRecord[]> {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new SourceReadError(`Cannot read input file ${path}: ${reason}`, { cause: err });
    }
    return this.parseText(text, path);
  }

  parseText(text: string, origin = 'input'): UserRecord[] {
    const result = Papa.parse<Record<string, string | undefined>>(text.replace(/^\uFEFF/, ''), {
      header: true,
      skipEmptyLines: 'greedy',
      transformHeader: (header) => header.trim(),
    });

    const structural = result.errors.find((e) => e.type === 'Quotes');
    if (structural) {
      throw new SourceReadError(`Malformed CSV in ${origin}${describeRow(structural.row)}: ${structural.message}`);
    }
    for (const issue of result.errors.filter((e) => e.type === 'FieldMismatch')) {
      this.logger.warn(LogCategory.SOURCE, `${issue.message}${describeRow(issue.row)}`);
    }

    const headers = result.meta.fields ?? [];
    const columnFor = this.mapColumns(headers, origin);

    if (result.data.length === 0) {
      throw new SourceReadError(`No user records found in ${origin}`);
    }

    this.logger.debug(LogCategory.SOURCE, `Parsed ${result.data.length} user records`, {
      origin,
      columns: headers,
    });

    return result.data.map((row, index) => toUserRecord(row, index + 1, columnFor));
  }

  /** Resolve each field to the header that carries it; missing optional columns read as ''. */
  private mapColumns(headers: string[], origin: string): Partial<Record<UserField, string>> {
    const byLabel = new Map(headers.map((h) => [h.toLowerCase(), h]));
    const columnFor: Partial<Record<UserField, string>> = {};
    for (const field of USER_FIELDS) {
      const header = byLabel.get(CSV_COLUMNS[field].toLowerCase());
      if (header !== undefined) columnFor[field] = header;
    }

    const missing = REQUIRED_FIELDS.filter((field) => columnFor[field] === undefined);
    if (missing.length > 0) {
      throw new SourceReadError(
        `${origin} is missing required column(s): ${missing.map((f) => CSV_COLUMNS[f]).join(', ')}`,
      );
    }

    const known = new Set(Object.values(columnFor));
    const unknown = headers.filter((h) => h !== '' && !known.has(h));
    if (unknown.length > 0) {
      this.logger.warn(LogCategory.SOURCE, `Ignoring unrecognised column(s): ${unknown.join(', ')}`);
    }
    return columnFor;
  }
}

function describeRow(row: number | undefined): string {
  return row === undefined ? '' : ` at data row ${row + 1}`;
}

function toUserRecord(
  row: Record<string, string | undefined>,
  rowNumber: number,
  columnFor: Partial<Record<UserField, string>>,
): UserRecord {
  const read = (field: UserField): string => {
    const header = columnFor[field];
    return header === undefined ? '' : (row[header] ?? '').trim();
  };
  return {
    rowNumber,
    displayName: read('displayName'),
    userPrincipalName: read('userPrincipalName'),
    password: read('password'),
    givenName: read('givenName'),
    surname: read('surname'),
    jobTitle: read('jobTitle'),
    department: read('department'),
    usageLocation: read('usageLocation'),
    officeLocation: read('officeLocation'),
    city: read('city'),
    state: read('state'),
    country: read('country'),
    postalCode: read('postalCode'),
  };
}

import ExcelJS from 'exceljs';
import type { Workbook, Worksheet } from 'exceljs';
import * as fs from 'fs';
import * as path from 'path';
import type { Logger } from '../lib/logger.js';
import {
  CONTACT_FIELDS,
  STATUS_MARKERS,
  statusFromMarker,
  type ContactField,
  type ContactInfo,
  type EmailRecord,
  type RecordStatus,
  type ResolvedStatus,
} from '../types/index.js';

export interface PendingOptions {
  /** Terminal statuses to treat as pending again. */
  retryStatuses?: readonly RecordStatus[];
}

export interface PendingSource {
  readPending(
    startRow: number,
    emailColumn: number,
    statusColumn: number,
    options?: PendingOptions
  ): Promise<EmailRecord[]>;
}

export interface ResultSink {
  writeResult(rowRef: number, status: ResolvedStatus, data?: ContactInfo): Promise<void>;
}

export interface SheetSummary {
  total: number;
  pending: number;
  successful: number;
  notFound: number;
  errors: number;
}

export interface StructureReport {
  created: boolean;
  fixedHeaders: string[];
}

export interface SpreadsheetStore extends PendingSource, ResultSink {
  ensureStructure(): Promise<StructureReport>;
  summary(): Promise<SheetSummary>;
}

export const CONTACT_HEADERS: Record<ContactField, string> = {
  name: 'Name',
  personalEmail: 'PersonalEmail',
  phone: 'Phone',
  sip: 'SIP',
  address: 'Address',
  department: 'Department',
  company: 'Company',
  officeLocation: 'OfficeLocation',
};

const HEADER_ROW = 1;
const DEFAULT_SHEET_NAME = 'Contacts';

export interface ExcelStoreOptions {
  sheetName?: string;
  emailColumn: number;
  statusColumn: number;
}

/** Rows only count when the email cell holds something address-shaped. */
function looksLikeEmail(value: string): boolean {
  return value.includes('@');
}

/**
 * Spreadsheet-backed store. Every write opens, updates and saves the
 * workbook so a crash never loses more than the record in flight.
 */
export class ExcelSpreadsheetStore implements SpreadsheetStore {
  constructor(
    private readonly filePath: string,
    private readonly options: ExcelStoreOptions,
    private readonly logger: Logger
  ) {}

  /** Header layout: email, status, then one column per contact field. */
  headers(): Map<number, string> {
    const headers = new Map<number, string>();
    headers.set(this.options.emailColumn, 'Email');
    headers.set(this.options.statusColumn, 'Status');
    CONTACT_FIELDS.forEach((field, index) => {
      headers.set(this.fieldColumn(index), CONTACT_HEADERS[field]);
    });
    return headers;
  }

  async ensureStructure(): Promise<StructureReport> {
    if (!fs.existsSync(this.filePath)) {
      const workbook = new ExcelJS.Workbook();
      const sheet = workbook.addWorksheet(this.options.sheetName ?? DEFAULT_SHEET_NAME);
      const headerRow = sheet.getRow(HEADER_ROW);
      for (const [column, header] of this.headers()) {
        headerRow.getCell(column).value = header;
      }
      headerRow.font = { bold: true };
      headerRow.commit();

      fs.mkdirSync(path.dirname(path.resolve(this.filePath)), { recursive: true });
      await workbook.xlsx.writeFile(this.filePath);
      this.logger.info({ file: this.filePath }, 'Created spreadsheet with headers');
      return { created: true, fixedHeaders: [...this.headers().values()] };
    }

    const { workbook, sheet } = await this.open();
    const headerRow = sheet.getRow(HEADER_ROW);
    const fixedHeaders: string[] = [];

    for (const [column, header] of this.headers()) {
      const cell = headerRow.getCell(column);
      if (cell.text.trim() !== header) {
        cell.value = header;
        fixedHeaders.push(header);
      }
    }

    if (fixedHeaders.length > 0) {
      headerRow.commit();
      await workbook.xlsx.writeFile(this.filePath);
      this.logger.info({ file: this.filePath, fixedHeaders }, 'Fixed spreadsheet headers');
    }
    return { created: false, fixedHeaders };
  }

  async readPending(
    startRow: number,
    emailColumn: number,
    statusColumn: number,
    options: PendingOptions = {}
  ): Promise<EmailRecord[]> {
    const { sheet } = await this.open();
    const retry = new Set(options.retryStatuses ?? []);
    const records: EmailRecord[] = [];

    for (let rowNumber = startRow; rowNumber <= sheet.rowCount; rowNumber++) {
      const row = sheet.getRow(rowNumber);
      const email = row.getCell(emailColumn).text.trim();
      if (!looksLikeEmail(email)) continue;

      const status = statusFromMarker(row.getCell(statusColumn).text);
      if (status === null) {
        this.logger.debug({ row: rowNumber }, 'Skipping row with unrecognised status marker');
        continue;
      }
      if (status === 'PENDING' || retry.has(status)) {
        records.push({ email, rowRef: rowNumber, status: 'PENDING' });
      }
    }

    this.logger.debug({ file: this.filePath, pending: records.length }, 'Read pending records');
    return records;
  }

  async writeResult(rowRef: number, status: ResolvedStatus, data?: ContactInfo): Promise<void> {
    const { workbook, sheet } = await this.open();
    const row = sheet.getRow(rowRef);

    row.getCell(this.options.statusColumn).value = STATUS_MARKERS[status];
    CONTACT_FIELDS.forEach((field, index) => {
      // NOT_FOUND and ERROR leave no stale contact data behind
      const value = status === 'SUCCESS' && data ? data[field] : null;
      row.getCell(this.fieldColumn(index)).value = value;
    });
    row.commit();

    await workbook.xlsx.writeFile(this.filePath);
  }

  async summary(): Promise<SheetSummary> {
    const { sheet } = await this.open();
    const summary: SheetSummary = { total: 0, pending: 0, successful: 0, notFound: 0, errors: 0 };

    for (let rowNumber = HEADER_ROW + 1; rowNumber <= sheet.rowCount; rowNumber++) {
      const row = sheet.getRow(rowNumber);
      if (!looksLikeEmail(row.getCell(this.options.emailColumn).text.trim())) continue;

      summary.total++;
      switch (statusFromMarker(row.getCell(this.options.statusColumn).text)) {
        case 'PENDING':
          summary.pending++;
          break;
        case 'SUCCESS':
          summary.successful++;
          break;
        case 'NOT_FOUND':
          summary.notFound++;
          break;
        case 'ERROR':
          summary.errors++;
          break;
        default:
          break;
      }
    }
    return summary;
  }

  private fieldColumn(index: number): number {
    return Math.max(this.options.emailColumn, this.options.statusColumn) + 1 + index;
  }

  private async open(): Promise<{ workbook: Workbook; sheet: Worksheet }> {
    if (!fs.existsSync(this.filePath)) {
      throw new Error(`Spreadsheet not found: ${this.filePath}`);
    }

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(this.filePath);

    const sheet = this.options.sheetName
      ? workbook.getWorksheet(this.options.sheetName)
      : workbook.worksheets[0];
    if (!sheet) {
      throw new Error(
        `Worksheet ${this.options.sheetName ?? '(first)'} not found in ${this.filePath}`
      );
    }
    return { workbook, sheet };
  }
}

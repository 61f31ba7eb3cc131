/**
 * Report export.
 *
 * Flattens a report into a table, then renders the table as CSV,
 * an Excel workbook (exceljs) or a PDF document (jspdf).
 */

import ExcelJS from "exceljs";
import { jsPDF } from "jspdf";
import type {
  AssetTypeAmount,
  BalanceSheet,
  DateRange,
  LedgerReport,
  ProfitAndLoss,
  ReportSection,
} from "@tallybook/ledger";
import type { JournalEntry, JournalEntryAccount } from "@tallybook/types";
import type { ExportFormat, ExportReport } from "../types/dto.js";
import type { AccountingService } from "./accounting-service.js";

// =============================================================================
// Types
// =============================================================================

export interface ReportTable {
  readonly title: string;
  readonly subtitle: string;
  readonly columns: readonly string[];
  readonly rows: readonly (readonly string[])[];
}

export interface ExportFile {
  readonly fileName: string;
  readonly contentType: string;
  readonly body: string | ArrayBuffer;
}

export const CONTENT_TYPES: Readonly<Record<ExportFormat, string>> = {
  csv: "text/csv; charset=utf-8",
  xlsx: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  pdf: "application/pdf",
};

/** Entries fetched per page while exporting the journal. */
const JOURNAL_PAGE_SIZE = 100;

// =============================================================================
// Tables
// =============================================================================

function day(timestamp: string): string {
  return timestamp.slice(0, 10);
}

function describeRange(range: DateRange): string {
  return `${day(range.start)} to ${day(range.end)}`;
}

function accountLabel(accountNumber: number | null, name: string): string {
  return accountNumber === null ? name : `${String(accountNumber)} ${name}`;
}

function sectionRows(section: ReportSection): string[][] {
  return [
    ...section.lines.map((line) => [
      section.title,
      accountLabel(line.accountNumber, line.name),
      line.assetType,
      line.amount,
    ]),
    ...totalRows(section.title, `Total ${section.title}`, section.totals),
  ];
}

function totalRows(
  section: string,
  label: string,
  totals: readonly AssetTypeAmount[],
): string[][] {
  return totals.map((t) => [section, label, t.assetType, t.amount]);
}

const STATEMENT_COLUMNS = ["Section", "Account", "Asset Type", "Amount"] as const;

export function balanceSheetTable(report: BalanceSheet): ReportTable {
  return {
    title: "Balance Sheet",
    subtitle: describeRange(report),
    columns: STATEMENT_COLUMNS,
    rows: [
      ...sectionRows(report.assets),
      ...sectionRows(report.liabilities),
      ...sectionRows(report.equity),
      ...totalRows("", "Total Liabilities and Equity", report.totalLiabilitiesAndEquity),
    ],
  };
}

export function profitAndLossTable(report: ProfitAndLoss): ReportTable {
  return {
    title: "Profit and Loss",
    subtitle: describeRange(report),
    columns: STATEMENT_COLUMNS,
    rows: [
      ...sectionRows(report.income),
      ...sectionRows(report.expenses),
      ...totalRows("", "Net Income", report.netIncome),
    ],
  };
}

export function ledgerTable(report: LedgerReport): ReportTable {
  const rows: string[][] = [];

  for (const account of report.accounts) {
    const label = accountLabel(account.accountNumber, account.name);
    rows.push([label, day(report.start), "", "Starting balance", "", "", account.startingBalance]);
    for (const line of account.lines) {
      rows.push([
        label,
        day(line.date),
        String(line.entryId),
        line.description,
        line.debit ?? "",
        line.credit ?? "",
        line.balance,
      ]);
    }
    rows.push([label, day(report.end), "", "Ending balance", "", "", account.endingBalance]);
  }

  return {
    title: "General Ledger",
    subtitle: describeRange(report),
    columns: ["Account", "Date", "Entry", "Description", "Debit", "Credit", "Balance"],
    rows,
  };
}

function lineAccount(line: JournalEntryAccount): string {
  return line.account === undefined
    ? line.accountId
    : accountLabel(line.account.accountNumber, line.account.name);
}

export function journalEntriesTable(
  entries: readonly JournalEntry[],
  range: DateRange,
): ReportTable {
  const rows: string[][] = [];

  for (const entry of entries) {
    for (const line of entry.accounts) {
      rows.push([
        String(entry.entryId),
        day(entry.postDate ?? entry.entryDate),
        entry.status,
        entry.description,
        lineAccount(line),
        line.entryType === "debit" ? line.amount : "",
        line.entryType === "credit" ? line.amount : "",
      ]);
    }
  }

  return {
    title: "Journal Entries",
    subtitle: describeRange(range),
    columns: ["Entry", "Date", "Status", "Description", "Account", "Debit", "Credit"],
    rows,
  };
}

/**
 * Every entry in range, across all pages.
 */
async function allJournalEntries(
  service: AccountingService,
  range: DateRange,
): Promise<readonly JournalEntry[]> {
  const entries: JournalEntry[] = [];
  let pageNumber = 1;

  for (;;) {
    const page = await service.listJournalEntries(range, {
      pageNumber,
      pageSize: JOURNAL_PAGE_SIZE,
    });
    entries.push(...page.results);
    if (!page.hasMore) {
      return entries;
    }
    pageNumber += 1;
  }
}

export async function buildReportTable(
  service: AccountingService,
  report: ExportReport,
  range: DateRange,
): Promise<ReportTable> {
  switch (report) {
    case "balance-sheet":
      return balanceSheetTable(await service.getBalanceSheet(range));
    case "profit-and-loss":
      return profitAndLossTable(await service.getProfitAndLoss(range));
    case "ledger":
      return ledgerTable(await service.getLedger(range));
    case "journal-entries":
      return journalEntriesTable(await allJournalEntries(service, range), range);
  }
}

// =============================================================================
// Renderers
// =============================================================================

function csvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function renderCsv(table: ReportTable): string {
  const lines = [table.columns, ...table.rows].map((row) => row.map(csvField).join(","));
  return `${lines.join("\n")}\n`;
}

export async function renderXlsx(table: ReportTable): Promise<ArrayBuffer> {
  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date();

  const sheet = workbook.addWorksheet(table.title);
  sheet.addRow([table.title]).font = { bold: true, size: 14 };
  sheet.addRow([table.subtitle]);
  sheet.addRow([]);
  sheet.addRow([...table.columns]).font = { bold: true };
  for (const row of table.rows) {
    sheet.addRow([...row]);
  }

  table.columns.forEach((column, i) => {
    const widest = Math.max(column.length, ...table.rows.map((row) => (row[i] ?? "").length));
    sheet.getColumn(i + 1).width = Math.min(Math.max(widest + 2, 10), 60);
  });

  return workbook.xlsx.writeBuffer();
}

const PDF_MARGIN = 14;
const PDF_LINE = 6;

export function renderPdf(table: ReportTable): ArrayBuffer {
  const pdf = new jsPDF({
    orientation: table.columns.length > 4 ? "landscape" : "portrait",
    unit: "mm",
    format: "a4",
  });

  const width = pdf.internal.pageSize.getWidth();
  const height = pdf.internal.pageSize.getHeight();
  const columnWidth = (width - PDF_MARGIN * 2) / table.columns.length;

  const fit = (text: string): string => {
    let out = text;
    while (out.length > 1 && pdf.getTextWidth(out) > columnWidth - 2) {
      out = out.slice(0, -1);
    }
    return out;
  };

  const writeRow = (row: readonly string[], y: number): void => {
    row.forEach((cell, i) => {
      pdf.text(fit(cell), PDF_MARGIN + i * columnWidth, y);
    });
  };

  pdf.setFontSize(14);
  pdf.text(table.title, PDF_MARGIN, PDF_MARGIN + 2);
  pdf.setFontSize(10);
  pdf.text(table.subtitle, PDF_MARGIN, PDF_MARGIN + 2 + PDF_LINE);

  let y = PDF_MARGIN + 2 + PDF_LINE * 3;
  pdf.setFont("helvetica", "bold");
  writeRow(table.columns, y);
  pdf.setFont("helvetica", "normal");

  for (const row of table.rows) {
    y += PDF_LINE;
    if (y > height - PDF_MARGIN) {
      pdf.addPage();
      y = PDF_MARGIN + PDF_LINE;
      pdf.setFont("helvetica", "bold");
      writeRow(table.columns, y);
      pdf.setFont("helvetica", "normal");
      y += PDF_LINE;
    }
    writeRow(row, y);
  }

  return pdf.output("arraybuffer");
}

// =============================================================================
// Export
// =============================================================================

export function exportFileName(
  report: ExportReport,
  format: ExportFormat,
  range: DateRange,
): string {
  return `${report}-${day(range.start)}-${day(range.end)}.${format}`;
}

async function render(table: ReportTable, format: ExportFormat): Promise<string | ArrayBuffer> {
  switch (format) {
    case "csv":
      return renderCsv(table);
    case "xlsx":
      return renderXlsx(table);
    case "pdf":
      return renderPdf(table);
  }
}

/**
 * Render one of the tenant's reports for a date range as a file.
 */
export async function exportReport(
  service: AccountingService,
  report: ExportReport,
  format: ExportFormat,
  range: DateRange,
): Promise<ExportFile> {
  const table = await buildReportTable(service, report, range);

  const body = await render(table, format);

  return {
    fileName: exportFileName(report, format, range),
    contentType: CONTENT_TYPES[format],
    body,
  };
}

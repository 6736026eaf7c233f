import type { RosterReport, StudentRecord } from "./types.ts";
import { classify, GRADE_BANDS } from "./grades.ts";

interface Column {
  header: string;
  align: "left" | "right";
}

// roll_no | name | marks | class, numbers right-aligned like a spreadsheet
const RECORD_COLUMNS: Column[] = [
  { header: "roll_no", align: "right" },
  { header: "name", align: "left" },
  { header: "marks", align: "right" },
  { header: "class", align: "left" },
];

/**
 * Lay out rows as a plain-text table.
 * Columns are as wide as their widest cell and separated by two spaces;
 * trailing spaces are trimmed from every line.
 */
function formatTable(columns: Column[], rows: string[][]): string {
  const widths = columns.map((column, index) =>
    Math.max(column.header.length, ...rows.map((row) => row[index].length))
  );

  const formatLine = (cells: string[]) =>
    cells
      .map((cell, index) =>
        columns[index].align === "right" ? cell.padStart(widths[index]) : cell.padEnd(widths[index])
      )
      .join("  ")
      .trimEnd();

  return [
    formatLine(columns.map((column) => column.header)),
    ...rows.map(formatLine),
  ].join("\n");
}

function recordCells(record: StudentRecord): string[] {
  return [String(record.rollNo), record.name, String(record.marks), classify(record.marks)];
}

/**
 * The whole roster as a table, sorted by roll number, with each student's class.
 */
export function renderRoster(records: readonly StudentRecord[]): string {
  const sorted = [...records].sort((a, b) => a.rollNo - b.rollNo);
  return formatTable(RECORD_COLUMNS, sorted.map(recordCells));
}

export function renderRecord(record: StudentRecord): string {
  return formatTable(RECORD_COLUMNS, [recordCells(record)]);
}

/**
 * Turn a report into the text shown by "Generate Report".
 * Every grade band is listed, in band order, including those with 0 students.
 */
export function renderReport(report: RosterReport): string {
  const bandWidth = Math.max(...GRADE_BANDS.map((band) => band.length));

  return [
    "--- Student Performance Report ---",
    `Total Students: ${report.total}`,
    `Average Marks: ${report.mean.toFixed(2)}`,
    `Highest Marks: ${report.max}`,
    `Lowest Marks: ${report.min}`,
    "",
    "--- Class Summary ---",
    ...GRADE_BANDS.map((band) => `${band.padEnd(bandWidth)}  ${report.gradeCounts[band]}`),
    "",
    "Top Performer(s):",
    formatTable(RECORD_COLUMNS, report.topPerformers.map(recordCells)),
    "----------------------------------",
  ].join("\n");
}

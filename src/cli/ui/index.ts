export { formatSummary, formatTableRow, formatTableSeparator, type SummaryItem, TABLE_WIDTHS } from "./formatters";
export { APP_NAME, color, ui, VERSION } from "./output";

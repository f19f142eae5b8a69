export { renderReceipt, receiptFileName } from './receipt.service.js';
export {
  renderSpreadsheet,
  exportFileName,
  XLSX_CONTENT_TYPE,
  type SpreadsheetColumn,
} from './spreadsheet.service.js';
export { REGISTRATION_EXPORT_COLUMNS, PAYMENT_EXPORT_COLUMNS } from './export-columns.js';

export { CSV_COLUMNS, csvHeader, csvRow, escapeCsvField, toSnakeCase } from './applicant-csv';

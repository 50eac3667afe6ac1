import Papa from 'papaparse';
import { ReportTable } from '../types';

export const toCsv = (table: ReportTable): string =>
  Papa.unparse(
    { fields: table.columns, data: table.rows.map((row) => table.columns.map((column) => row[column] ?? '')) },
    { header: true }
  );

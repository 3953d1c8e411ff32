import ExcelJS from 'exceljs';
import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { logger } from './logger';
import { StoreResult } from './types';

export interface OutputProduct {
  product_title: string;
  product_url: string;
  size_chart: { headers: string[]; rows: Record<string, string>[] };
}

export interface OutputStore {
  store_name: string;
  extraction_date: string;
  products: OutputProduct[];
  errors?: string[];
}

/** Shapes results for the output file; `errors` only appears when there are some. */
export function toOutput(results: StoreResult[]): OutputStore[] {
  return results.map((result) => {
    const products: OutputProduct[] = [];
    for (const product of result.products) {
      if (!product.sizeChart) continue;
      products.push({
        product_title: product.title,
        product_url: product.url,
        size_chart: { headers: product.sizeChart.headers, rows: product.sizeChart.rows },
      });
    }

    const store: OutputStore = {
      store_name: result.storeName,
      extraction_date: result.extractionDate,
      products,
    };
    if (result.errors.length > 0) store.errors = result.errors;
    return store;
  });
}

export async function saveResults(results: StoreResult[], outputPath: string): Promise<void> {
  await mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
  await writeFile(outputPath, `${JSON.stringify(toOutput(results), null, 2)}\n`, 'utf-8');
  logger.info(`Results saved to ${outputPath}`);
}

export async function exportToExcel(results: StoreResult[], outputPath: string): Promise<void> {
  const workbook = new ExcelJS.Workbook();

  // --- Sheet 1: Products ---
  const sheet1 = workbook.addWorksheet('Products');

  sheet1.columns = [
    { header: 'Store', key: 'store', width: 28 },
    { header: 'Product', key: 'title', width: 50 },
    { header: 'URL', key: 'url', width: 70 },
    { header: 'Columns', key: 'columns', width: 10 },
    { header: 'Rows', key: 'rows', width: 10 },
  ];
  sheet1.getRow(1).font = { bold: true };

  for (const result of results) {
    for (const product of result.products) {
      sheet1.addRow({
        store: result.storeName,
        title: product.title,
        url: product.url,
        columns: product.sizeChart?.headers.length ?? 0,
        rows: product.sizeChart?.rows.length ?? 0,
      });
    }
  }

  // --- Sheet 2: Size charts, one block per product ---
  const sheet2 = workbook.addWorksheet('Size charts');
  let currentRow = 1;

  for (const result of results) {
    for (const product of result.products) {
      const chart = product.sizeChart;
      if (!chart) continue;

      sheet2.getCell(currentRow, 1).value = product.title;
      sheet2.getCell(currentRow, 1).font = { bold: true };
      sheet2.getCell(currentRow, 2).value = product.url;
      currentRow += 2;

      chart.headers.forEach((header, i) => {
        sheet2.getCell(currentRow, 1 + i).value = header;
        sheet2.getCell(currentRow, 1 + i).font = { bold: true };
      });
      currentRow++;

      for (const row of chart.rows) {
        chart.headers.forEach((header, i) => {
          const value = row[header];
          if (value !== undefined) sheet2.getCell(currentRow, 1 + i).value = parseNumericValue(value);
        });
        currentRow++;
      }

      currentRow += 2; // Space between charts
    }
  }

  sheet2.getColumn(1).width = 40;
  for (let i = 2; i <= 20; i++) {
    sheet2.getColumn(i).width = 14;
  }

  await mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
  await workbook.xlsx.writeFile(outputPath);
  logger.info(`Excel file saved to ${outputPath}`);
}

export function parseNumericValue(val: string): string | number {
  const num = Number(val);
  if (!isNaN(num) && val.trim() !== '') return num;
  return val;
}

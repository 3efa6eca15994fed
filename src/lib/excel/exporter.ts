import ExcelJS from 'exceljs';

export type SummaryRow = [label: string, value: string | number];

function sanitizeSheetName(name: string) {
  return name.replace(/[\\/*?:\[\]]/g, '_').slice(0, 31) || 'Sheet';
}

export async function buildSummaryWorkbook(rows: SummaryRow[], meta: { creator: string; sheetName?: string }) {
  const wb = new ExcelJS.Workbook();
  wb.creator = meta.creator;
  wb.created = new Date();

  const ws = wb.addWorksheet(sanitizeSheetName(meta.sheetName ?? '_Summary'));
  ws.addRow(['Field', 'Value']);
  ws.getRow(1).font = { bold: true };
  ws.views = [{ state: 'frozen', ySplit: 1 }];

  for (const [label, value] of rows) {
    ws.addRow([label, value]);
  }

  ws.getColumn(1).width = 28;
  ws.getColumn(2).width = Math.min(80, Math.max(12, ...rows.map(([, value]) => String(value).length)));

  const buf = await wb.xlsx.writeBuffer();
  return Buffer.from(buf);
}

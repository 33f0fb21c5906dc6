import * as XLSX from 'xlsx';

export const HEADER = ['Title', 'Author', 'Genre', 'Added by', 'Top prio', 'Notes', 'Avery +1', 'Blake +1', 'Casey +1'];
export const SUB_HEADER = ['', '', '', '', '', '', '', '', ''];

export function buildWorkbook(rows: Array<Array<string | number | null>>, sheetName = 'Books'): Buffer {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), sheetName);
  return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
}

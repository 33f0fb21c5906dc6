import * as XLSX from 'xlsx';

import { BookClubStore } from '../../book-club/store/BookClubStore';
import { errorMessage, ValidationError } from '../../common/errors';
import { ProgressManager } from '../../progress/ProgressManager';
import { BOOK_IMPORT_CONFIG } from '../config';
import { BookRow, ImportBooksResult } from '../dto/book-import.dto';

const { COLUMNS, DEFAULTS, TASK_ID } = BOOK_IMPORT_CONFIG;

function cell(row: readonly unknown[], index: number): string | null {
  const value = row[index];
  if (value === undefined || value === null) {
    return null;
  }
  const text = String(value).trim();
  return text === '' ? null : text;
}

export function memberNamesFromHeader(header: readonly unknown[]): string[] {
  const names = new Set<string>();
  for (let i = COLUMNS.FIRST_MEMBER_VOTE; i < header.length; i++) {
    const match = cell(header, i)?.match(BOOK_IMPORT_CONFIG.MEMBER_VOTE_HEADER);
    if (match) {
      names.add(match[1].trim());
    }
  }
  return [...names].sort();
}

export function readBookRows(rows: readonly unknown[][]): BookRow[] {
  const books: BookRow[] = [];
  rows.slice(BOOK_IMPORT_CONFIG.HEADER_ROWS).forEach((row, i) => {
    const title = cell(row, COLUMNS.TITLE);
    if (!title) {
      return;
    }
    books.push({
      row: i + BOOK_IMPORT_CONFIG.HEADER_ROWS + 1,
      title,
      author: cell(row, COLUMNS.AUTHOR),
      genre: cell(row, COLUMNS.GENRE),
      addedBy: cell(row, COLUMNS.ADDED_BY),
    });
  });
  return books;
}

/**
 * Replaces the club's data with the contents of a "books of interest" workbook.
 * Members come from the "+1" vote columns and get default preferences; books get
 * placeholder genre and page count where the sheet has none.
 */
export class BookImportService {
  private progressManager: ProgressManager;

  constructor(private readonly store: BookClubStore) {
    this.progressManager = ProgressManager.getInstance();
  }

  async importWorkbook(buffer: Buffer): Promise<ImportBooksResult> {
    try {
      this.progressManager.startProgress(TASK_ID, 'Reading Excel file');
      const report = this.progressManager.reporter(TASK_ID);

      const rows = this.readFirstSheet(buffer);
      const header = rows[0] ?? [];
      const bookRows = readBookRows(rows);
      if (bookRows.length === 0) {
        throw new ValidationError('The workbook does not contain any books');
      }
      const memberNames = memberNamesFromHeader(header);

      console.log(`Found ${bookRows.length} books in spreadsheet`);
      report(10, `Found ${bookRows.length} books`);

      await this.store.reset();
      report(20, 'Existing data cleared');

      const memberIds = new Map<string, number>();
      for (const name of memberNames) {
        const id = await this.store.addMember({
          name,
          preferredLength: DEFAULTS.PREFERRED_LENGTH,
          likedGenres: [...DEFAULTS.LIKED_GENRES],
        });
        memberIds.set(name, id);
      }
      console.log(`Added ${memberNames.length} members: ${memberNames.join(', ')}`);
      report(30, `Added ${memberNames.length} members`);

      let added = 0;
      let skipped = 0;

      for (let i = 0; i < bookRows.length; i++) {
        const item = bookRows[i];
        try {
          await this.store.addBook({
            title: item.title,
            author: item.author ?? DEFAULTS.AUTHOR,
            genre: item.genre ?? DEFAULTS.GENRE,
            pageCount: DEFAULTS.PAGE_COUNT,
            suggestedBy: item.addedBy ? memberIds.get(item.addedBy) ?? null : null,
          });
          added++;

          if (added % BOOK_IMPORT_CONFIG.LOG_EVERY === 0) {
            console.log(`Added ${added} books...`);
          }
        } catch (error) {
          skipped++;
          console.error(`Skipped '${item.title}' (row ${item.row}):`, errorMessage(error));
        }

        report(
          30 + Math.floor(((i + 1) / bookRows.length) * 70),
          `Processed ${i + 1} of ${bookRows.length} books`,
        );
      }

      const message = `Import complete. Books added: ${added}, skipped: ${skipped}, members: ${memberNames.length}`;
      console.log(message);
      this.progressManager.completeProgress(TASK_ID, message);

      return {
        message,
        details: { added, skipped, members: memberNames },
      };
    } catch (error) {
      this.progressManager.errorProgress(TASK_ID, errorMessage(error));
      throw error;
    }
  }

  private readFirstSheet(buffer: Buffer): unknown[][] {
    let workbook: XLSX.WorkBook;
    try {
      workbook = XLSX.read(buffer);
    } catch {
      throw new ValidationError('Could not read the Excel file. It may be damaged or in the wrong format.');
    }

    const sheetName = workbook.SheetNames[0];
    const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
    if (!sheet) {
      throw new ValidationError('The workbook has no sheets');
    }

    return XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: false, defval: null });
  }
}

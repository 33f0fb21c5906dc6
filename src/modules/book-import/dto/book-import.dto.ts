export interface BookRow {
  row: number;
  title: string;
  author: string | null;
  genre: string | null;
  addedBy: string | null;
}

export interface ImportBooksResult {
  message: string;
  details: {
    added: number;
    skipped: number;
    members: string[];
  };
}

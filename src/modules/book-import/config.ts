export const BOOK_IMPORT_CONFIG = {
  TASK_ID: 'import',
  MIME_TYPE: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  // Row 1 holds the column names, row 2 a sub-header
  HEADER_ROWS: 2,
  COLUMNS: {
    TITLE: 0,
    AUTHOR: 1,
    GENRE: 2,
    ADDED_BY: 3,
    TOP_PRIORITY: 4,
    NOTES: 5,
    // "<Name> +1" vote columns start here, one per member
    FIRST_MEMBER_VOTE: 6,
  },
  MEMBER_VOTE_HEADER: /^(.+?)\s*\+1$/,
  DEFAULTS: {
    AUTHOR: 'Unknown Author',
    GENRE: 'Unspecified',
    PAGE_COUNT: 300,
    PREFERRED_LENGTH: 300,
    LIKED_GENRES: ['Fantasy', 'Science Fiction', 'Contemporary Fiction', 'Mystery', 'Historical Fiction'],
  },
  LOG_EVERY: 10,
} as const;

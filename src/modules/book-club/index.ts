export { BookClubController } from './controller/BookClubController';
export { TypeOrmBookClubStore } from './store/TypeOrmBookClubStore';
export type { BookClubSnapshotSource, BookClubStore, NewBook, NewMember } from './store/BookClubStore';

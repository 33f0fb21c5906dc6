import 'reflect-metadata';

export { Book } from './Book';
export { Member } from './Member';
export { ReadingHistory } from './ReadingHistory';
export { Veto } from './Veto';

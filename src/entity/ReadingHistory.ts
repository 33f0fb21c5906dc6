import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';

@Entity()
export class ReadingHistory {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column('integer')
    book_id!: number;

    @CreateDateColumn()
    read_date!: Date;

    @Index()
    @Column('integer')
    round_number!: number;
}

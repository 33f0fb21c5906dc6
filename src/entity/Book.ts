import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';

@Entity()
export class Book {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column('text')
    title!: string;

    @Column('text')
    author!: string;

    @Index()
    @Column('text')
    genre!: string;

    @Column('integer')
    page_count!: number;

    // Member id; null for a house suggestion
    @Column('integer', { nullable: true })
    suggested_by!: number | null;
}

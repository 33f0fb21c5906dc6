import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn } from 'typeorm';

@Entity()
export class Member {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column('text')
    name!: string;

    @Column('integer', { default: 300 })
    preferred_length!: number;

    @Column('simple-json')
    liked_genres!: string[];

    @CreateDateColumn()
    created_at!: Date;
}

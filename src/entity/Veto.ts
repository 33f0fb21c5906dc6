import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';

@Entity()
@Index(['member_id', 'round_number'])
export class Veto {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column('integer')
    member_id!: number;

    @Column('text')
    genre!: string;

    @Column('integer')
    round_number!: number;
}

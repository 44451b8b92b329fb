import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, OneToMany } from 'typeorm';
import { Seat } from './seat.entity';

@Entity('screens')
export class Screen {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ unique: true })
  name!: string;

  @OneToMany(() => Seat, (seat) => seat.screen, { cascade: true })
  seats!: Seat[];

  @CreateDateColumn()
  createdAt!: Date;
}

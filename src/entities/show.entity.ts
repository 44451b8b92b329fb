import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn, ManyToOne, JoinColumn, Check } from 'typeorm';
import { Screen } from './screen.entity';
import { decimalTransformer } from './decimal.transformer';

@Entity('shows')
@Check('CHK_shows_booked_seats', '"bookedSeats" >= 0 AND "bookedSeats" <= "totalSeats"')
export class Show {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column()
  movieTitle!: string;

  @Column({ type: 'uuid' })
  screenId!: string;

  @ManyToOne(() => Screen, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'screenId' })
  screen!: Screen;

  @Column({ type: 'timestamptz' })
  scheduledAt!: Date;

  @Column({ type: 'decimal', precision: 10, scale: 2, transformer: decimalTransformer })
  basePrice!: number;

  @Column({ type: 'int' })
  totalSeats!: number;

  // Only moved by SeatInventoryStore, in the same transaction as the seat-state change.
  @Column({ type: 'int', default: 0 })
  bookedSeats!: number;

  @Column({ default: true })
  isActive!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}

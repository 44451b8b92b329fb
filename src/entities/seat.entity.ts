import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, CreateDateColumn, JoinColumn, Index } from 'typeorm';
import { Screen } from './screen.entity';
import { decimalTransformer } from './decimal.transformer';

export enum SeatTier {
  STANDARD = 'STANDARD',
  PREMIUM = 'PREMIUM',
  VIP = 'VIP',
}

/**
 * Physical seat on a screen, shared by every show on that screen.
 * Never mutated after creation.
 */
@Entity('seats')
@Index('UQ_seats_screen_label', ['screenId', 'label'], { unique: true })
export class Seat {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  screenId!: string;

  @Column()
  row!: string;

  @Column({ type: 'int' })
  number!: number;

  @Column()
  label!: string;

  @Column({ type: 'enum', enum: SeatTier, default: SeatTier.STANDARD })
  tier!: SeatTier;

  @Column({ type: 'decimal', precision: 10, scale: 2, default: 0, transformer: decimalTransformer })
  priceDelta!: number;

  @ManyToOne(() => Screen, (screen) => screen.seats, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'screenId' })
  screen!: Screen;

  @CreateDateColumn()
  createdAt!: Date;
}

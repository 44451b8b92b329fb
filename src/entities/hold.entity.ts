import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';

@Entity('holds')
@Index('IDX_holds_expires_at', ['expiresAt'])
export class Hold {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid', unique: true })
  token!: string;

  @Column({ type: 'uuid' })
  showId!: string;

  @Column({ type: 'uuid', array: true })
  seatIds!: string[];

  @Column()
  actorId!: string;

  @Column({ type: 'timestamptz' })
  expiresAt!: Date;

  @Column({ type: 'int', default: 0 })
  extensionCount!: number;

  // Set once a booking attempt is awaiting payment against this hold.
  @Column({ type: 'uuid', nullable: true })
  bookingId!: string | null;

  @CreateDateColumn()
  createdAt!: Date;
}

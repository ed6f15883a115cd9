import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Index } from 'typeorm';
import { Booking } from './booking.entity';

export enum BookingHistoryAction {
  CREATED = 'created',
  CONFIRMED = 'confirmed',
  CANCELLED = 'cancelled',
  EXPIRED = 'expired',
  REFUNDED = 'refunded',
}

export const SYSTEM_ACTOR = 'system';

/** Append-only audit trail of a booking. Rows are inserted, never updated. */
@Entity('booking_history')
@Index('IDX_booking_history_booking', ['bookingId', 'occurredAt'])
export class BookingHistory {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'booking_id', type: 'uuid' })
  bookingId!: string;

  @ManyToOne(() => Booking, (booking) => booking.history, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'booking_id' })
  booking?: Booking;

  @Column({ type: 'enum', enum: BookingHistoryAction })
  action!: BookingHistoryAction;

  @Column({ type: 'varchar', length: 64 })
  actor!: string;

  @Column({ name: 'occurred_at', type: 'timestamptz' })
  occurredAt!: Date;

  @Column({ type: 'jsonb', nullable: true })
  metadata!: Record<string, unknown> | null;
}

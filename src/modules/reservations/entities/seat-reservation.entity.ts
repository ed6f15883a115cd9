import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  Unique,
  Index,
} from 'typeorm';
import { Showing } from '@modules/catalog/entities/showing.entity';
import { Seat } from '@modules/catalog/entities/seat.entity';

/**
 * A temporary hold on one seat for one showing. The unique key on
 * (showing, seat) is what keeps two holders apart; a row whose
 * `expiresAt` has passed is dead and gets replaced or swept.
 */
@Entity('seat_reservations')
@Unique('UQ_seat_reservations_showing_seat', ['showingId', 'seatId'])
@Index('IDX_seat_reservations_expires_at', ['expiresAt'])
@Index('IDX_seat_reservations_user', ['userId'])
export class SeatReservation {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'user_id', type: 'uuid' })
  userId!: string;

  @Column({ name: 'showing_id', type: 'uuid' })
  showingId!: string;

  @ManyToOne(() => Showing, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'showing_id' })
  showing?: Showing;

  @Column({ name: 'seat_id', type: 'uuid' })
  seatId!: string;

  @ManyToOne(() => Seat)
  @JoinColumn({ name: 'seat_id' })
  seat?: Seat;

  @Column({ name: 'session_key', type: 'varchar', length: 64, nullable: true })
  sessionKey!: string | null;

  @Column({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @Column({ name: 'expires_at', type: 'timestamptz' })
  expiresAt!: Date;
}

/** A hold is dead from the instant `now` reaches `expiresAt`. */
export function isHoldLive(hold: Pick<SeatReservation, 'expiresAt'>, now: Date): boolean {
  return hold.expiresAt.getTime() > now.getTime();
}

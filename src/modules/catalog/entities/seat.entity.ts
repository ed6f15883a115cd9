import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Unique, Index } from 'typeorm';

export enum SeatStatus {
  AVAILABLE = 'AVAILABLE',
  OCCUPIED = 'OCCUPIED',
  MAINTENANCE = 'MAINTENANCE',
  BLOCKED = 'BLOCKED',
}

export enum SeatTier {
  STANDARD = 'STANDARD',
  PREMIUM = 'PREMIUM',
  VIP = 'VIP',
}

/**
 * A physical seat of a screen. Seats outlive showings; whether a seat is
 * free for a given showing is decided by holds and bookings, never by
 * `status`, which only tracks physical condition.
 */
@Entity('seats')
@Unique('UQ_seats_screen_row_number', ['screenNumber', 'row', 'seatNumber'])
@Unique('UQ_seats_screen_position', ['screenNumber', 'positionX', 'positionY'])
@Index('IDX_seats_screen', ['screenNumber'])
export class Seat {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'screen_number', type: 'integer' })
  screenNumber!: number;

  @Column({ length: 5 })
  row!: string;

  @Column({ name: 'seat_number', type: 'integer' })
  seatNumber!: number;

  @Column({ type: 'enum', enum: SeatTier, default: SeatTier.STANDARD })
  tier!: SeatTier;

  @Column({ type: 'enum', enum: SeatStatus, default: SeatStatus.AVAILABLE })
  status!: SeatStatus;

  @Column({ name: 'is_accessible', default: false })
  isAccessible!: boolean;

  @Column({ name: 'is_couple', default: false })
  isCouple!: boolean;

  @Column({ name: 'position_x', type: 'integer' })
  positionX!: number;

  @Column({ name: 'position_y', type: 'integer' })
  positionY!: number;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;
}

export function seatLabel(seat: Pick<Seat, 'row' | 'seatNumber'>): string {
  return `${seat.row}${seat.seatNumber}`;
}

import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  Unique,
  Index,
} from 'typeorm';
import { Seat } from '@modules/catalog/entities/seat.entity';
import { Booking } from './booking.entity';

@Entity('booked_seats')
@Unique('UQ_booked_seats_booking_seat', ['bookingId', 'seatId'])
@Index('IDX_booked_seats_seat', ['seatId'])
export class BookedSeat {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'booking_id', type: 'uuid' })
  bookingId!: string;

  @ManyToOne(() => Booking, (booking) => booking.seats, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'booking_id' })
  booking?: Booking;

  @Column({ name: 'seat_id', type: 'uuid' })
  seatId!: string;

  @ManyToOne(() => Seat)
  @JoinColumn({ name: 'seat_id' })
  seat?: Seat;

  // frozen when the booking is created
  @Column({ name: 'price_paid', type: 'decimal', precision: 10, scale: 2 })
  pricePaid!: number;
}

import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Check, Index } from 'typeorm';

@Entity('showings')
@Check('CHK_showings_time_window', '"start_time" < "end_time"')
@Index('IDX_showings_screen_start', ['screenNumber', 'startTime'])
export class Showing {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'movie_title', length: 255 })
  movieTitle!: string;

  @Column({ name: 'screen_number', type: 'integer' })
  screenNumber!: number;

  @Column({ name: 'start_time', type: 'timestamptz' })
  startTime!: Date;

  @Column({ name: 'end_time', type: 'timestamptz' })
  endTime!: Date;

  @Column({ name: 'base_price', type: 'decimal', precision: 10, scale: 2 })
  basePrice!: number;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;
}

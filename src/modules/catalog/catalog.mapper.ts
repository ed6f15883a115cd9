import { Seat, seatLabel } from './entities/seat.entity';
import { Showing } from './entities/showing.entity';
import { SeatResponseDto } from './dto/seat-response.dto';
import { ShowingResponseDto } from './dto/showing-response.dto';

export function toShowingResponse(showing: Showing): ShowingResponseDto {
  return {
    id: showing.id,
    movieTitle: showing.movieTitle,
    screenNumber: showing.screenNumber,
    startTime: showing.startTime,
    endTime: showing.endTime,
    basePrice: Number(showing.basePrice),
  };
}

export function toSeatResponse(seat: Seat): SeatResponseDto {
  return {
    id: seat.id,
    label: seatLabel(seat),
    row: seat.row,
    seatNumber: seat.seatNumber,
    tier: seat.tier,
    status: seat.status,
    isAccessible: seat.isAccessible,
    isCouple: seat.isCouple,
    positionX: seat.positionX,
    positionY: seat.positionY,
  };
}

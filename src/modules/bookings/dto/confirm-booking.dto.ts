import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class ConfirmBookingDto {
  @ApiProperty({ example: 'card' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  paymentMethod!: string;

  @ApiProperty({ example: 'pay_0001', description: 'Reference issued by the payment provider' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  paymentReference!: string;
}

import { IsInt, Min } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class PlaceListingBidDto {
  @ApiProperty({ description: 'Bid amount, escrowed in full', example: 100, minimum: 1 })
  @IsInt()
  @Min(1)
  amount!: number;
}

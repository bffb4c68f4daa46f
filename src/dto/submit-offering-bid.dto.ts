import { IsInt, Min } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class SubmitOfferingBidDto {
  @ApiProperty({ description: 'Number of shares wanted', example: 5, minimum: 1 })
  @IsInt()
  @Min(1)
  quantity!: number;

  @ApiProperty({
    description: 'Escrowed amount; the unit price is deposit / quantity rounded down',
    example: 50,
    minimum: 1,
  })
  @IsInt()
  @Min(1)
  deposit!: number;
}

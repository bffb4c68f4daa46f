import { IsInt, Min } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

/**
 * Deposit / withdraw body
 */
export class AmountDto {
  @ApiProperty({ example: 1000, minimum: 1 })
  @IsInt()
  @Min(1)
  amount!: number;
}

import { IsInt, IsMongoId, Min } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class TransferHoldingDto {
  @ApiProperty({ description: 'Recipient user ID' })
  @IsMongoId()
  to!: string;

  @ApiProperty({ description: 'Number of shares', example: 1, minimum: 1 })
  @IsInt()
  @Min(1)
  count!: number;
}

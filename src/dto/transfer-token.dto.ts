import { IsMongoId } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class TransferTokenDto {
  @ApiProperty({ description: 'Recipient user ID' })
  @IsMongoId()
  to!: string;
}

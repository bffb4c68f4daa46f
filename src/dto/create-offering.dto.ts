import {
  IsString,
  IsInt,
  Min,
  Max,
  MinLength,
  MaxLength,
  IsOptional,
  IsDateString,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class CreateOfferingDto {
  @ApiProperty({ description: 'Asset name', example: 'Vintage watch' })
  @IsString()
  @MinLength(1)
  @MaxLength(200)
  name!: string;

  @ApiPropertyOptional({ description: 'Asset description', example: 'Serviced in 2025' })
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  description?: string;

  @ApiProperty({ description: 'Number of shares on offer', example: 100, minimum: 1 })
  @IsInt()
  @Min(1)
  @Max(1_000_000)
  totalUnits!: number;

  @ApiProperty({
    description: 'Minimum total bid value for the offering to succeed',
    example: 5000,
    minimum: 0,
  })
  @IsInt()
  @Min(0)
  reservePrice!: number;

  @ApiPropertyOptional({
    description: 'Bidding deadline (ISO 8601). Without it only early closure ends the offering',
    example: '2030-01-01T12:00:00.000Z',
  })
  @IsOptional()
  @IsDateString()
  biddingEndsAt?: string;
}

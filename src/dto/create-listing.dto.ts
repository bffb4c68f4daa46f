import {
  IsEnum,
  IsInt,
  IsMongoId,
  IsOptional,
  IsDateString,
  Min,
  ValidateIf,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { ListingKind } from '../common/enums/listing.enum';

export class CreateListingDto {
  @ApiProperty({ enum: ListingKind, example: ListingKind.LEDGER })
  @IsEnum(ListingKind)
  kind!: ListingKind;

  @ApiPropertyOptional({ description: 'Asset whose share is sold (LEDGER listings)' })
  @ValidateIf((dto: CreateListingDto) => dto.kind === ListingKind.LEDGER)
  @IsMongoId()
  assetId?: string;

  @ApiPropertyOptional({ description: 'Registry token sold (TOKEN listings)', example: 1 })
  @ValidateIf((dto: CreateListingDto) => dto.kind === ListingKind.TOKEN)
  @IsInt()
  @Min(1)
  tokenId?: number;

  @ApiProperty({ description: 'Minimum winning bid', example: 50, minimum: 0 })
  @IsInt()
  @Min(0)
  reservePrice!: number;

  @ApiPropertyOptional({
    description: 'End time (ISO 8601); after it anyone may execute the listing',
    example: '2030-01-01T12:00:00.000Z',
  })
  @IsOptional()
  @IsDateString()
  endsAt?: string;
}

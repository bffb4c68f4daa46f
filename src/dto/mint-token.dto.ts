import { IsMongoId, IsOptional, IsString, IsUrl, MaxLength, MinLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class MintTokenDto {
  @ApiProperty({ description: 'Receiving user ID' })
  @IsMongoId()
  to!: string;

  @ApiProperty({ example: 'Painting #1' })
  @IsString()
  @MinLength(1)
  @MaxLength(200)
  name!: string;

  @ApiPropertyOptional({ example: 'https://example.com/tokens/1.json' })
  @IsOptional()
  @IsUrl()
  uri?: string;
}

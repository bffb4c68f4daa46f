import { IsBoolean, IsOptional, IsString, MinLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class ApproveTokenDto {
  @ApiPropertyOptional({
    description: 'Operator to approve; omit or null to clear the approval',
    example: 'marketplace',
    nullable: true,
  })
  @IsOptional()
  @IsString()
  @MinLength(1)
  operator?: string | null;
}

export class SetApprovalForAllDto {
  @ApiProperty({ example: 'marketplace' })
  @IsString()
  @MinLength(1)
  operator!: string;

  @ApiProperty({ example: true })
  @IsBoolean()
  approved!: boolean;
}

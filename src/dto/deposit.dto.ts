import { IsInt, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';
import { Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class DepositDto {
  @ApiProperty({ description: 'Amount in the smallest unit', example: 5000, minimum: 1 })
  @IsInt()
  @Min(1)
  @Max(1000000000)
  @Type(() => Number)
  amount!: number;

  @ApiPropertyOptional({ example: 'Top up' })
  @IsOptional()
  @IsString()
  @MaxLength(200)
  description?: string;
}

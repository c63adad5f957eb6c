import { IsInt, Min, Max } from 'class-validator';
import { Type } from 'class-transformer';
import { ApiProperty } from '@nestjs/swagger';

export class CreateListingDto {
  @ApiProperty({
    description: 'Lowest acceptable first bid',
    example: 100,
    minimum: 1,
  })
  @IsInt()
  @Min(1)
  @Max(1000000000)
  @Type(() => Number)
  minPrice!: number;

  @ApiProperty({
    description: 'Bid amount that settles the auction immediately (>= minPrice)',
    example: 1000,
    minimum: 1,
  })
  @IsInt()
  @Min(1)
  @Max(1000000000)
  @Type(() => Number)
  buyNowPrice!: number;
}

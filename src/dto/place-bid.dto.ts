import { IsInt, Min, Max } from 'class-validator';
import { Type } from 'class-transformer';
import { ApiProperty } from '@nestjs/swagger';

export class PlaceBidDto {
  @ApiProperty({
    description: 'Bid amount escrowed from the caller wallet (>= minPrice, or >= 105% of the highest bid)',
    example: 150,
    minimum: 1,
    maximum: 1000000000,
  })
  @IsInt()
  @Min(1)
  @Max(1000000000)
  @Type(() => Number)
  amount!: number;
}

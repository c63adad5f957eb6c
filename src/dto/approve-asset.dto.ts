import { IsOptional, IsString, IsNotEmpty } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { MARKETPLACE_CUSTODY } from '../common/constants';

export class ApproveAssetDto {
  @ApiPropertyOptional({
    description: 'Operator allowed to move the asset, the marketplace when omitted',
    example: MARKETPLACE_CUSTODY,
    default: MARKETPLACE_CUSTODY,
  })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  operator?: string;
}

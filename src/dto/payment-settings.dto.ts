import { IsBoolean } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class PaymentSettingsDto {
  @ApiProperty({
    description: 'When false, transfers to this account fail and land in the credit ledger',
    example: true,
  })
  @IsBoolean()
  acceptsPayments!: boolean;
}

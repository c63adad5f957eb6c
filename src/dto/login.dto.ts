import { IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

/**
 * Credentials exchanged for a bearer token
 * The token subject is the account id used as caller for listings, bids and withdrawals
 */
export class LoginDto {
  @ApiProperty({ description: 'Account username', example: 'alice', maxLength: 64 })
  @IsString()
  @IsNotEmpty({ message: 'Username is required' })
  @MaxLength(64)
  username!: string;

  @ApiProperty({ description: 'Account password', example: 'test-password', maxLength: 128 })
  @IsString()
  @IsNotEmpty({ message: 'Password is required' })
  @MaxLength(128)
  password!: string;
}

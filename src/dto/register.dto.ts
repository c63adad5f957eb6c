import { IsString, MinLength, IsEmail, IsOptional, IsInt, Min, Max } from 'class-validator';
import { Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class RegisterDto {
  @ApiProperty({
    description: 'Username (must be unique)',
    example: 'alice',
    minLength: 3,
  })
  @IsString()
  @MinLength(3, { message: 'Username must be at least 3 characters long' })
  username!: string;

  @ApiProperty({
    description: 'Password (will be hashed)',
    example: 'test-password',
    minLength: 6,
  })
  @IsString()
  @MinLength(6, { message: 'Password must be at least 6 characters long' })
  password!: string;

  @ApiPropertyOptional({
    description: 'Email (optional)',
    example: 'alice@example.com',
  })
  @IsOptional()
  @IsEmail({}, { message: 'Email must be a valid email address' })
  email?: string;

  @ApiPropertyOptional({
    description: 'Initial wallet deposit in the smallest unit',
    example: 10000,
    default: 0,
  })
  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(1000000000)
  @Type(() => Number)
  initialBalance?: number;
}

import { ApiProperty } from '@nestjs/swagger';
import {
  IsNotEmpty,
  IsString,
  Matches,
  MaxLength,
} from 'class-validator';

export class SignupDto {
  @ApiProperty({ example: 'ada', description: 'Unique username' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  @Matches(/^\S+$/, { message: 'username must not contain spaces' })
  username!: string;

  @ApiProperty({
    example: 'password123',
    description: 'Password (min 6 characters)',
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  password!: string;

  @ApiProperty({ example: 'password123', description: 'Repeat the password' })
  @IsString()
  @IsNotEmpty()
  confirmPassword!: string;
}

export class LoginDto {
  @ApiProperty({ example: 'ada' })
  @IsString()
  @IsNotEmpty()
  username!: string;

  @ApiProperty({ example: 'password123' })
  @IsString()
  @IsNotEmpty()
  password!: string;
}

export class AuthUserDto {
  @ApiProperty({ example: 1, nullable: true, type: Number })
  id!: number | null;

  @ApiProperty({ example: 'ada' })
  username!: string;

  @ApiProperty({ example: false })
  isGuest!: boolean;
}

export class AuthResponseDto {
  @ApiProperty({ type: AuthUserDto })
  user!: AuthUserDto;

  @ApiProperty({ example: 'signed.jwt.token' })
  accessToken!: string;
}

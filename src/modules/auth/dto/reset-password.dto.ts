import { IsNotEmpty, IsString } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class ResetPasswordDto {
  @ApiProperty({ example: 'n3wpassword' })
  @IsString()
  @IsNotEmpty()
  password!: string;

  @ApiProperty({ example: 'n3wpassword' })
  @IsString()
  @IsNotEmpty()
  confirm_password!: string;
}

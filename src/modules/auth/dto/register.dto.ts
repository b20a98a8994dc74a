import { IsEmail, IsNotEmpty, IsString } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class RegisterDto {
  @ApiProperty({
    description: '5 to 30 characters, none of $ % \\ / < > : ^ ? !',
    example: 'alice',
  })
  @IsString()
  @IsNotEmpty()
  username!: string;

  @ApiProperty({ example: 'alice@example.com' })
  @IsEmail()
  email!: string;

  @ApiProperty({
    description: '9 to 30 characters with at least one letter and one digit',
    example: 'p4ssword1',
  })
  @IsString()
  @IsNotEmpty()
  password!: string;
}

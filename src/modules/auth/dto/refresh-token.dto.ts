import { IsNotEmpty, IsString } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class RefreshTokenDto {
  @ApiProperty({ description: 'Renewal token returned by login' })
  @IsString()
  @IsNotEmpty()
  refresh_token!: string;
}

import { IsOptional, IsString } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';

export class LogoutDto {
  @ApiPropertyOptional({
    description: 'Renewal token to revoke along with the access token',
  })
  @IsOptional()
  @IsString()
  refresh_token?: string;
}

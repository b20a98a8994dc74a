import { IsOptional, IsString } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';

export class FilterTodosDto {
  @ApiPropertyOptional({ description: 'Exact title to match' })
  @IsOptional()
  @IsString()
  title?: string;
}

import { ApiProperty } from '@nestjs/swagger';
import { IsISO8601 } from 'class-validator';

export class DateRangeDto {
  @ApiProperty({ example: '2024-01-01', description: 'Inclusive; a bare date starts at 00:00 UTC' })
  @IsISO8601({ strict: true })
  start!: string;

  @ApiProperty({ example: '2024-12-31', description: 'Inclusive; a bare date runs to 23:59:59.999 UTC' })
  @IsISO8601({ strict: true })
  end!: string;
}

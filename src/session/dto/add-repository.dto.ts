import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class AddRepositoryDto {
  @ApiProperty({ example: 'https://github.com/octo-org/octo-repo' })
  @IsString()
  @IsNotEmpty()
  url!: string;

  @ApiPropertyOptional({ description: 'Overrides the session token for this request' })
  @IsOptional()
  @IsString()
  token?: string;
}

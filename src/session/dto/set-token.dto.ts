import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

export class SetTokenDto {
  @ApiProperty({ description: 'GitHub personal access token' })
  @IsString()
  @IsNotEmpty()
  token!: string;
}

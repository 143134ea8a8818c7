import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class ChatMessageDto {
  @ApiProperty({ example: 'Where is my order 482913057614?' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(2000)
  message!: string;
}

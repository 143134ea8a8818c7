import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class CreateMessageDto {
  @ApiProperty() @IsString() @IsNotEmpty() order_id!: string;
  @ApiProperty({ example: 'customer' }) @IsString() @IsNotEmpty() @MaxLength(64) sender!: string;
  @ApiProperty() @IsString() @IsNotEmpty() @MaxLength(4000) content!: string;
}

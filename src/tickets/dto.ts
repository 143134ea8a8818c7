import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class CreateTicketDto {
  @ApiProperty() @IsString() @IsNotEmpty() order_id!: string;
  @ApiProperty() @IsString() @IsNotEmpty() @MaxLength(4000) issue!: string;
}

import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class EscalateDto {
  @ApiProperty({ description: 'What the customer needs a human for' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(4000)
  issue!: string;

  @ApiProperty({ required: false }) @IsOptional() @IsString() order_id?: string;
  @ApiProperty({ required: false }) @IsOptional() @IsString() customer_id?: string;
  @ApiProperty({ required: false, description: 'Email or phone to reach the customer' })
  @IsOptional()
  @IsString()
  contact?: string;
}

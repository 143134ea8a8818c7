import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsNumber, IsOptional, IsString, MaxLength } from 'class-validator';

export class CreateOrderDto {
  @ApiProperty() @IsString() @IsNotEmpty() customer_id!: string;
  @ApiProperty() @IsNumber() total_amount!: number;

  @ApiProperty({ required: false, description: 'Generated when absent; kept verbatim when given', maxLength: 64 })
  @IsOptional()
  @IsString()
  @MaxLength(64)
  tracking_id?: string;

  @ApiProperty({ required: false, default: 'pending' }) @IsOptional() @IsString() @IsNotEmpty() status?: string;
  @ApiProperty({ required: false }) @IsOptional() @IsString() shop_id?: string;
  @ApiProperty({ required: false }) @IsOptional() @IsString() delivery_address?: string;
}

export class UpdateOrderStatusDto {
  @ApiProperty({ example: 'out_for_delivery' }) @IsString() @IsNotEmpty() @MaxLength(64) status!: string;
}

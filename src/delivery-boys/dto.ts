import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class CreateDeliveryBoyDto {
  @ApiProperty() @IsString() @IsNotEmpty() name!: string;

  @ApiProperty() @IsString() @IsNotEmpty() phone!: string;

  @ApiProperty({ required: false, default: 'available' }) @IsOptional() @IsString() @IsNotEmpty() status?: string;
}

export class AssignOrderDto {
  @ApiProperty() @IsString() @IsNotEmpty() order_id!: string;
  @ApiProperty() @IsString() @IsNotEmpty() delivery_boy_id!: string;
}

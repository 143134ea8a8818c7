import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsNumber, IsOptional, IsString } from 'class-validator';

export class CreateProductDto {
  @ApiProperty() @IsString() @IsNotEmpty() shop_id!: string;
  @ApiProperty() @IsString() @IsNotEmpty() name!: string;
  @ApiProperty() @IsNumber() price!: number;
  @ApiProperty({ required: false }) @IsOptional() @IsString() description?: string;
}

export class ProductQueryDto {
  @ApiProperty({ required: false, description: 'Only products of this shop' })
  @IsOptional()
  @IsString()
  shop_id?: string;
}

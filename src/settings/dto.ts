import { ApiProperty } from '@nestjs/swagger';
import { Allow, IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { Json } from '../supabase/supabase.types';

export class SetSettingDto {
  @ApiProperty({ example: 'delivery_fee' }) @IsString() @IsNotEmpty() @MaxLength(128) key!: string;

  @ApiProperty({ required: false, description: 'Any JSON value', example: { amount: 25, currency: 'EGP' } })
  @Allow()
  value?: Json;
}

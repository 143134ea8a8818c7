import { Injectable } from '@nestjs/common';
import { SupabaseService } from '../supabase/supabase.service';
import { ProductRow } from '../supabase/supabase.types';
import { CreateProductDto, ProductQueryDto } from './dto';

@Injectable()
export class ProductsService {
  constructor(private readonly supabase: SupabaseService) {}

  create(dto: CreateProductDto): Promise<ProductRow> {
    return this.supabase.insert('products', {
      shop_id: dto.shop_id,
      name: dto.name,
      price: dto.price,
      description: dto.description,
    });
  }

  list(query: ProductQueryDto): Promise<ProductRow[]> {
    return this.supabase.select('products', { filters: { shop_id: query.shop_id } });
  }
}

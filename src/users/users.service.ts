import { Injectable } from '@nestjs/common';
import { SupabaseService } from '../supabase/supabase.service';
import { UserRow } from '../supabase/supabase.types';
import { CreateUserDto } from './dto';

@Injectable()
export class UsersService {
  constructor(private readonly supabase: SupabaseService) {}

  create(dto: CreateUserDto): Promise<UserRow> {
    return this.supabase.insert('users', { name: dto.name, email: dto.email, phone: dto.phone });
  }

  list(): Promise<UserRow[]> {
    return this.supabase.select('users');
  }
}

import { Body, Controller, Get, Post } from '@nestjs/common';
import { ApiOkResponse, ApiTags } from '@nestjs/swagger';
import { SettingsService } from './settings.service';
import { SetSettingDto } from './dto';

@ApiTags('Admin/Settings')
@Controller('admin/settings')
export class AdminSettingsController {
  constructor(private readonly settings: SettingsService) {}

  @Get()
  @ApiOkResponse({ description: 'All settings as a key -> value map' })
  getAll() {
    return this.settings.getAll();
  }

  @Post()
  set(@Body() dto: SetSettingDto) {
    return this.settings.set(dto.key, dto.value ?? null);
  }
}

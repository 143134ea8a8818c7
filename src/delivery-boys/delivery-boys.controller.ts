import { Body, Controller, Get, Post } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { DeliveryBoysService } from './delivery-boys.service';
import { CreateDeliveryBoyDto } from './dto';

@ApiTags('Delivery')
@Controller('delivery_boys')
export class DeliveryBoysController {
  constructor(private readonly service: DeliveryBoysService) {}

  @Post()
  create(@Body() dto: CreateDeliveryBoyDto) {
    return this.service.create(dto);
  }

  @Get()
  list() {
    return this.service.list();
  }
}

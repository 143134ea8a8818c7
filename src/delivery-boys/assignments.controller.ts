import { Body, Controller, Get, Param, Post } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { DeliveryBoysService } from './delivery-boys.service';
import { AssignOrderDto } from './dto';

@ApiTags('Delivery')
@Controller()
export class AssignmentsController {
  constructor(private readonly service: DeliveryBoysService) {}

  @Post('assign_order')
  assign(@Body() dto: AssignOrderDto) {
    return this.service.assign(dto);
  }

  @Get('assignments/order/:orderId')
  forOrder(@Param('orderId') orderId: string) {
    return this.service.assignmentsForOrder(orderId);
  }
}

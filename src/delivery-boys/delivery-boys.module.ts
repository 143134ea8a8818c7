import { Module } from '@nestjs/common';
import { AssignmentsController } from './assignments.controller';
import { DeliveryBoysController } from './delivery-boys.controller';
import { DeliveryBoysService } from './delivery-boys.service';

@Module({
  controllers: [DeliveryBoysController, AssignmentsController],
  providers: [DeliveryBoysService],
})
export class DeliveryBoysModule {}

import { Controller, Get, Param } from '@nestjs/common';
import { OrdersService } from '../../application/orders.service';

@Controller('download')
export class DownloadController {
  constructor(private readonly ordersService: OrdersService) {}

  /** Accepts an order id, the store's order id or a preview id. */
  @Get(':identifier')
  download(@Param('identifier') identifier: string) {
    return this.ordersService.getDownload(identifier);
  }
}

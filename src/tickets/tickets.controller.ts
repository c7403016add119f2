import { Controller, Get, Header, Param } from '@nestjs/common';
import { ViewsService } from '../views/views.service';
import { TicketsService } from './tickets.service';

@Controller('ticket')
export class TicketsController {
  constructor(
    private readonly ticketsService: TicketsService,
    private readonly views: ViewsService,
  ) { }

  @Get(':pnr')
  @Header('Content-Type', 'text/html; charset=utf-8')
  async show(@Param('pnr') pnr: string): Promise<string> {
    const ticket = await this.ticketsService.getTicket(pnr);
    return this.views.render('ticket', ticket);
  }
}

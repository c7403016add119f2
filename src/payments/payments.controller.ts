import {
  Body,
  Controller,
  Get,
  Header,
  HttpStatus,
  Param,
  Post,
  Res,
} from '@nestjs/common';
import type { FastifyReply } from 'fastify';
import { BookingsService } from '../bookings/bookings.service';
import { ThrottlePayment } from '../common/decorators/throttle.decorator';
import { ViewsService } from '../views/views.service';
import { PayBookingDto } from './dto/pay-booking.dto';
import { PaymentsService } from './payments.service';

@Controller()
export class PaymentsController {
  constructor(
    private readonly paymentsService: PaymentsService,
    private readonly bookingsService: BookingsService,
    private readonly views: ViewsService,
  ) { }

  @Get('payment/:pnr')
  @Header('Content-Type', 'text/html; charset=utf-8')
  async paymentForm(@Param('pnr') pnr: string): Promise<string> {
    const booking = await this.bookingsService.getBooking(pnr);
    return this.views.render('payment', { booking });
  }

  @Post('pay')
  @ThrottlePayment()
  async pay(@Body() dto: PayBookingDto, @Res() reply: FastifyReply): Promise<void> {
    const result = await this.paymentsService.pay(dto);

    if (result.outcome === 'confirmed') {
      reply.status(HttpStatus.SEE_OTHER).redirect(`/ticket/${result.booking.pnr}`);
      return;
    }

    const status = result.outcome === 'declined' ? HttpStatus.PAYMENT_REQUIRED : HttpStatus.BAD_REQUEST;
    const html = this.views.render('payment', { booking: result.booking, error: result.message });

    reply.status(status).type('text/html; charset=utf-8').send(html);
  }
}

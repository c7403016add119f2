import { Body, Controller, Get, Header, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ThrottleSearch } from '../common/decorators/throttle.decorator';
import { TravelDate } from '../modules/schedule/domain/value-objects/travel-date.vo';
import { ViewsService } from '../views/views.service';
import { SearchSchedulesDto } from './dto/search-schedules.dto';
import { SchedulesService } from './schedules.service';

@Controller()
export class SchedulesController {
  constructor(
    private readonly schedulesService: SchedulesService,
    private readonly views: ViewsService,
  ) { }

  @Get()
  @Header('Content-Type', 'text/html; charset=utf-8')
  async searchForm(): Promise<string> {
    const stations = await this.schedulesService.listStations();

    return this.views.render('index', {
      stations,
      today: TravelDate.today().value,
    });
  }

  @Post('search')
  @ThrottleSearch()
  @HttpCode(HttpStatus.OK)
  @Header('Content-Type', 'text/html; charset=utf-8')
  async search(@Body() dto: SearchSchedulesDto): Promise<string> {
    const result = await this.schedulesService.search(dto);

    return this.views.render('results', {
      ...result,
      travelDate: result.criteria.travelDate,
      passengerOptions: this.schedulesService.passengerCountOptions(),
    });
  }
}

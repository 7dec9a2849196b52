import {
  Body,
  Controller,
  Delete,
  Get,
  MessageEvent,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Put,
  Query,
  Sse,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { unwrapResult } from '../shared/operation-result.http';
import {
  ChainNameDto,
  ConnectionPairDto,
  CoordinateDto,
  CreateConnectionDto,
  DurationOverrideDto,
  TransportClassDto,
} from './network.dto';
import { NetworkWorkspaceService } from './network-workspace.service';

@Controller('network')
export class NetworkController {
  constructor(private readonly networks: NetworkWorkspaceService) {}

  private get workspace() {
    return this.networks.workspace;
  }

  @Get()
  overview() {
    return this.workspace.overview();
  }

  @Put('cities/:name')
  addCity(@Param('name') name: string, @Body() body: CoordinateDto) {
    return unwrapResult(this.workspace.addCity(name, body));
  }

  @Patch('cities/:name')
  moveCity(@Param('name') name: string, @Body() body: CoordinateDto) {
    return unwrapResult(this.workspace.updateCityCoordinates(name, body));
  }

  /** Former neighbours of the city are joined pairwise. */
  @Delete('cities/:name')
  removeCity(@Param('name') name: string) {
    return unwrapResult(this.workspace.removeCity(name));
  }

  @Delete('default-cities')
  removeDefaultCities() {
    return unwrapResult(this.workspace.removeDefaultCities());
  }

  @Post('connections')
  addConnection(@Body() body: CreateConnectionDto) {
    return unwrapResult(
      this.workspace.addConnection(body.from, body.to, body.transportClass),
    );
  }

  @Delete('connections')
  removeConnection(@Query() query: ConnectionPairDto) {
    return unwrapResult(this.workspace.removeConnection(query.from, query.to));
  }

  @Put('connections/transport-class')
  setTransportClass(@Body() body: TransportClassDto) {
    return unwrapResult(
      this.workspace.setTransportClass(body.from, body.to, body.transportClass),
    );
  }

  @Put('connections/break')
  markBreak(@Body() body: ConnectionPairDto) {
    return unwrapResult(this.workspace.markBreak(body.from, body.to));
  }

  @Delete('connections/break')
  unmarkBreak(@Query() query: ConnectionPairDto) {
    return unwrapResult(this.workspace.unmarkBreak(query.from, query.to));
  }

  @Put('connections/duration')
  setDuration(@Body() body: DurationOverrideDto) {
    return unwrapResult(
      this.workspace.setDurationOverride(body.from, body.to, body.minutes),
    );
  }

  @Delete('connections/duration')
  clearDuration(@Query() query: ConnectionPairDto) {
    return unwrapResult(this.workspace.clearDurationOverride(query.from, query.to));
  }

  @Get('chains')
  chains() {
    return this.workspace.chainSummaries();
  }

  @Put('chains/:index/name')
  renameChain(
    @Param('index', ParseIntPipe) index: number,
    @Body() body: ChainNameDto,
  ) {
    return { name: unwrapResult(this.workspace.setChainName(index, body.name)) };
  }

  @Delete('chains/:index/name')
  clearChainName(@Param('index', ParseIntPipe) index: number): void {
    unwrapResult(this.workspace.clearChainName(index));
  }

  @Get('travel-times')
  travelTime(@Query() query: ConnectionPairDto) {
    return unwrapResult(this.workspace.travelTimeBetween(query.from, query.to));
  }

  @Get('transport-classes')
  transportClasses() {
    return {
      defaultTransportClass: this.workspace.defaultTransportClass,
      items: this.workspace.listTransportClasses(),
    };
  }

  @Sse('events')
  events(): Observable<MessageEvent> {
    return this.networks
      .events()
      .pipe(map((event) => ({ type: event.type, data: event })));
  }
}

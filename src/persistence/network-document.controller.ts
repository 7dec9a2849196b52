import { Body, Controller, Get, Post, Put } from '@nestjs/common';
import { NetworkWorkspaceService } from '../network/network-workspace.service';
import { DocumentNameDto } from './network-document.dto';

@Controller('network/document')
export class NetworkDocumentController {
  constructor(private readonly networks: NetworkWorkspaceService) {}

  @Get()
  export() {
    return this.networks.exportDocument();
  }

  /**
   * Replaces the whole network. The branch registry is reseeded from the new
   * chains and the history starts over.
   */
  @Put()
  import(@Body() body: unknown) {
    return this.networks.importDocument(body);
  }

  @Post('save')
  async save(@Body() body: DocumentNameDto) {
    return this.networks.saveDocument(body.name);
  }

  @Post('load')
  async load(@Body() body: DocumentNameDto) {
    return this.networks.loadDocument(body.name);
  }
}

import { Controller, Get, Post } from '@nestjs/common';
import { NetworkWorkspaceService } from '../network/network-workspace.service';
import { unwrapResult } from '../shared/operation-result.http';

@Controller('history')
export class HistoryController {
  constructor(private readonly networks: NetworkWorkspaceService) {}

  @Get()
  list() {
    const workspace = this.networks.workspace;
    const { canUndo, canRedo } = workspace.overview();
    return {
      capacity: workspace.historyCapacity,
      canUndo,
      canRedo,
      entries: workspace.historyEntries(),
    };
  }

  @Post('undo')
  undo() {
    const result = this.networks.workspace.undo();
    return { version: unwrapResult(result), message: result.message };
  }

  @Post('redo')
  redo() {
    const result = this.networks.workspace.redo();
    return { version: unwrapResult(result), message: result.message };
  }
}

import { Module } from '@nestjs/common';
import { BranchesController } from '../branches/branches.controller';
import { HistoryController } from '../history/history.controller';
import { NetworkDocumentController } from '../persistence/network-document.controller';
import { NetworkDocumentRepository } from '../persistence/network-document.repository';
import { NetworkController } from './network.controller';
import { NetworkWorkspaceService } from './network-workspace.service';

@Module({
  controllers: [
    NetworkDocumentController,
    NetworkController,
    BranchesController,
    HistoryController,
  ],
  providers: [NetworkWorkspaceService, NetworkDocumentRepository],
  exports: [NetworkWorkspaceService],
})
export class NetworkModule {}

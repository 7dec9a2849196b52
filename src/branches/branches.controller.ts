import { Body, Controller, Get, Param, Post } from '@nestjs/common';
import { NetworkWorkspaceService } from '../network/network-workspace.service';
import { unwrapResult } from '../shared/operation-result.http';
import { BRANCH_COLORS, BRANCH_LINE_STYLES } from './branch.constants';
import { ApplyBranchDto, MergeBranchesDto, SplitBranchDto } from './branch.dto';

@Controller('branches')
export class BranchesController {
  constructor(private readonly networks: NetworkWorkspaceService) {}

  @Get()
  list() {
    const workspace = this.networks.workspace;
    return {
      activeBranchId: workspace.activeBranchId,
      items: workspace.branches(),
      palette: { colors: BRANCH_COLORS, lineStyles: BRANCH_LINE_STYLES },
    };
  }

  @Get('tree')
  tree() {
    return this.networks.workspace.branchTree();
  }

  @Post('merge')
  merge(@Body() body: MergeBranchesDto) {
    return unwrapResult(
      this.networks.workspace.merge(
        body.firstBranchId,
        body.secondBranchId,
        body.firstCity,
        body.secondCity,
      ),
    );
  }

  /** Without a branchId the active branch is applied. */
  @Post('apply')
  apply(@Body() body: ApplyBranchDto) {
    return unwrapResult(this.networks.workspace.applyBranch(body.branchId));
  }

  @Post(':id/split')
  split(@Param('id') id: string, @Body() body: SplitBranchDto) {
    return unwrapResult(this.networks.workspace.split(id, body.city));
  }

  @Post(':id/activate')
  activate(@Param('id') id: string) {
    return unwrapResult(this.networks.workspace.setActiveBranch(id));
  }
}

import { Body, Controller, Delete, Get, Param, Post } from '@nestjs/common';
import { TopologyStoreService } from './topology-store.service';
import { CreateLinkDto, CreateNodeDto } from './topology.dto';

/**
 * 토폴로지 전체 조회와 노드/링크 선언적 생성·삭제.
 */
@Controller('topology')
export class TopologyController {
  constructor(private readonly store: TopologyStoreService) {}

  /** GET /topology → 노드+링크 스냅샷 */
  @Get()
  getTopology() {
    return this.store.getTopology();
  }

  /** POST /topology/nodes */
  @Post('nodes')
  addNode(@Body() body: CreateNodeDto) {
    return this.store.addNode(body, 'api');
  }

  /** DELETE /topology/nodes/:id → 링크가 남아 있으면 409 */
  @Delete('nodes/:id')
  async removeNode(@Param('id') id: string) {
    await this.store.removeNode(id, 'api');
    return { status: 'removed', node_id: id };
  }

  /** POST /topology/links → 양 끝 노드가 없으면 400 */
  @Post('links')
  addLink(@Body() body: CreateLinkDto) {
    return this.store.addLink(body, 'api');
  }

  @Delete('links/:id')
  async removeLink(@Param('id') id: string) {
    await this.store.removeLink(id, 'api');
    return { status: 'removed', link_id: id };
  }
}

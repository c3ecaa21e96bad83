import { Body, Controller, Get, Param, Put, Query } from '@nestjs/common';
import { TopologyStoreService } from './topology-store.service';
import { LinkMetricsDto, ListLinksQueryDto, SetLinkStateQueryDto } from './topology.dto';
import { UnknownEntityError } from './topology.errors';
import type { TopologyLink } from './topology.types';

/** 링크 상태/메트릭 조회 및 수동 갱신. */
@Controller('links')
export class LinksController {
  constructor(private readonly store: TopologyStoreService) {}

  /** GET /links?state=&node_id= */
  @Get()
  listLinks(@Query() query: ListLinksQueryDto) {
    const links = this.store.getLinks({ state: query.state, nodeId: query.node_id });
    return {
      links,
      count: links.length,
      timestamp: new Date().toISOString(),
    };
  }

  /** GET /links/by-interface/:iface → 인터페이스 이름으로 링크 찾기 */
  @Get('by-interface/:iface')
  getLinkByInterface(@Param('iface') iface: string): TopologyLink {
    const link = this.store.findLinkByInterface(iface);
    if (!link) {
      throw new UnknownEntityError('link', `interface ${iface}`);
    }
    return link;
  }

  @Get(':id')
  getLink(@Param('id') id: string): TopologyLink {
    return this.requireLink(id);
  }

  @Get(':id/metrics')
  getLinkMetrics(@Param('id') id: string) {
    return this.requireLink(id).metrics;
  }

  /** PUT /links/:id/state?state=X → 명시적 override */
  @Put(':id/state')
  async setState(@Param('id') id: string, @Query() query: SetLinkStateQueryDto) {
    const result = await this.store.setState(id, query.state, { source: 'api' });
    return {
      applied: result.applied,
      link: result.link,
      event: result.events[0] ?? null,
    };
  }

  /** PUT /links/:id/metrics → 메트릭 저장 후 트래픽이 있으면 active 로 */
  @Put(':id/metrics')
  async updateMetrics(@Param('id') id: string, @Body() body: LinkMetricsDto) {
    const result = await this.store.upsertMetrics(id, body, { source: 'api' });
    return {
      applied: result.applied,
      link: result.link,
      events: result.events,
    };
  }

  private requireLink(id: string): TopologyLink {
    const link = this.store.getLink(id);
    if (!link) {
      throw new UnknownEntityError('link', id);
    }
    return link;
  }
}

import type { Cache } from 'cache-manager';

export interface CiliumEndpointInfo {
  /** namespace/name */
  id: string;
  name: string;
  namespace: string;
  podName: string;
  nodeName: string;
  ips: string[];
  state: string;
}

const ipKey = (ip: string) => `endpoint:ip:${ip}`;
const nodeKey = (endpointId: string) => `endpoint:node:${endpointId}`;

/**
 * IP → 엔드포인트 → 토폴로지 노드 매핑 캐시. Redis 가 설정되면 여러 인스턴스가 공유한다.
 */
export class EndpointRegistry {
  constructor(
    private readonly cache: Cache,
    private readonly ttlMs: number,
  ) {}

  async remember(endpoint: CiliumEndpointInfo, nodeId: string | null): Promise<void> {
    await Promise.all(endpoint.ips.map((ip) => this.cache.set(ipKey(ip), endpoint.id, this.ttlMs)));
    if (nodeId) {
      await this.cache.set(nodeKey(endpoint.id), nodeId, this.ttlMs);
    }
  }

  async forget(endpoint: CiliumEndpointInfo): Promise<void> {
    await Promise.all([
      ...endpoint.ips.map((ip) => this.cache.del(ipKey(ip))),
      this.cache.del(nodeKey(endpoint.id)),
    ]);
  }

  async endpointForIp(ip: string): Promise<string | null> {
    const value = await this.cache.get<string>(ipKey(ip));
    return typeof value === 'string' ? value : null;
  }

  async nodeForEndpoint(endpointId: string): Promise<string | null> {
    const value = await this.cache.get<string>(nodeKey(endpointId));
    return typeof value === 'string' ? value : null;
  }
}

import { caching } from 'cache-manager';
import { EndpointRegistry, type CiliumEndpointInfo } from './endpoint-registry';

const endpoint: CiliumEndpointInfo = {
  id: 'shop/web-7d9',
  name: 'web-7d9',
  namespace: 'shop',
  podName: 'web-7d9',
  nodeName: 'worker-1',
  ips: ['10.0.0.5', 'fd00::5'],
  state: 'ready',
};

describe('EndpointRegistry', () => {
  let registry: EndpointRegistry;

  beforeEach(async () => {
    registry = new EndpointRegistry(await caching('memory', { max: 100, ttl: 60_000 }), 60_000);
  });

  it('maps every address to the endpoint and the endpoint to its node', async () => {
    await registry.remember(endpoint, 'web');

    await expect(registry.endpointForIp('10.0.0.5')).resolves.toBe('shop/web-7d9');
    await expect(registry.endpointForIp('fd00::5')).resolves.toBe('shop/web-7d9');
    await expect(registry.nodeForEndpoint('shop/web-7d9')).resolves.toBe('web');
  });

  it('keeps the address mapping when the endpoint has no node yet', async () => {
    await registry.remember(endpoint, null);

    await expect(registry.endpointForIp('10.0.0.5')).resolves.toBe('shop/web-7d9');
    await expect(registry.nodeForEndpoint('shop/web-7d9')).resolves.toBeNull();
  });

  it('forgets all mappings of a deleted endpoint', async () => {
    await registry.remember(endpoint, 'web');
    await registry.forget(endpoint);

    await expect(registry.endpointForIp('10.0.0.5')).resolves.toBeNull();
    await expect(registry.endpointForIp('fd00::5')).resolves.toBeNull();
    await expect(registry.nodeForEndpoint('shop/web-7d9')).resolves.toBeNull();
  });
});

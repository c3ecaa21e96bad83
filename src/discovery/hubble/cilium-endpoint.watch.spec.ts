import { KubeConfig } from '@kubernetes/client-node';
import { KubernetesEndpointWatch, parseCiliumEndpoint } from './cilium-endpoint.watch';

describe('parseCiliumEndpoint', () => {
  it('extracts identity, node and addresses', () => {
    const endpoint = parseCiliumEndpoint({
      apiVersion: 'cilium.io/v2',
      kind: 'CiliumEndpoint',
      metadata: { name: 'web-7d9', namespace: 'shop', uid: 'abc' },
      status: {
        id: 1234,
        state: 'ready',
        networking: {
          node: '192.168.1.10',
          addressing: [{ ipv4: '10.0.0.5' }, { ipv6: 'fd00::5' }],
        },
      },
    });

    expect(endpoint).toEqual({
      id: 'shop/web-7d9',
      name: 'web-7d9',
      namespace: 'shop',
      podName: 'web-7d9',
      nodeName: '192.168.1.10',
      ips: ['10.0.0.5', 'fd00::5'],
      state: 'ready',
    });
  });

  it('tolerates endpoints without status yet', () => {
    expect(parseCiliumEndpoint({ metadata: { name: 'web-7d9', namespace: 'shop' } })).toEqual({
      id: 'shop/web-7d9',
      name: 'web-7d9',
      namespace: 'shop',
      podName: 'web-7d9',
      nodeName: '',
      ips: [],
      state: 'unknown',
    });
  });

  it('rejects objects without a name', () => {
    expect(parseCiliumEndpoint({ metadata: { namespace: 'shop' } })).toBeNull();
    expect(parseCiliumEndpoint('not-an-object')).toBeNull();
  });
});

describe('KubernetesEndpointWatch', () => {
  it('watches the whole cluster unless a namespace is given', () => {
    expect(new KubernetesEndpointWatch(undefined, new KubeConfig()).path).toBe('/apis/cilium.io/v2/ciliumendpoints');
    expect(new KubernetesEndpointWatch('shop', new KubeConfig()).path).toBe(
      '/apis/cilium.io/v2/namespaces/shop/ciliumendpoints',
    );
  });

  it('returns immediately when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const onChange = jest.fn();

    await new KubernetesEndpointWatch('shop', new KubeConfig()).watch(controller.signal, onChange);

    expect(onChange).not.toHaveBeenCalled();
  });
});

import { Logger } from '@nestjs/common';
import { KubeConfig, Watch } from '@kubernetes/client-node';
import { z } from 'zod';
import type { CiliumEndpointInfo } from './endpoint-registry';

export type EndpointChangeType = 'ADDED' | 'MODIFIED' | 'DELETED';

export interface EndpointChange {
  type: EndpointChangeType;
  endpoint: CiliumEndpointInfo;
}

/** CiliumEndpoint 변경 스트림. 연결이 끝나면 resolve, 실패하면 reject 한다. */
export interface EndpointWatch {
  watch(signal: AbortSignal, onChange: (change: EndpointChange) => void): Promise<void>;
}

const CiliumEndpointSchema = z.object({
  metadata: z.object({
    name: z.string().min(1),
    namespace: z.string().default('default'),
  }),
  status: z
    .object({
      state: z.string().default('unknown'),
      networking: z
        .object({
          node: z.string().default(''),
          addressing: z
            .array(z.object({ ipv4: z.string().optional(), ipv6: z.string().optional() }))
            .default([]),
        })
        .optional(),
    })
    .optional(),
});

const WatchPhaseSchema = z.enum(['ADDED', 'MODIFIED', 'DELETED']);

/** watch 콜백의 원시 객체를 검증해 CiliumEndpointInfo 로 바꾼다. 형식이 다르면 null. */
export function parseCiliumEndpoint(raw: unknown): CiliumEndpointInfo | null {
  const parsed = CiliumEndpointSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }
  const { metadata, status } = parsed.data;
  const addressing = status?.networking?.addressing ?? [];
  return {
    id: `${metadata.namespace}/${metadata.name}`,
    name: metadata.name,
    namespace: metadata.namespace,
    podName: metadata.name,
    nodeName: status?.networking?.node ?? '',
    ips: addressing.flatMap((entry) => [entry.ipv4, entry.ipv6]).filter((ip): ip is string => Boolean(ip)),
    state: status?.state ?? 'unknown',
  };
}

function isAbortable(value: unknown): value is { abort(): void } {
  return typeof value === 'object' && value !== null && 'abort' in value && typeof value.abort === 'function';
}

/**
 * Kubernetes API 의 CiliumEndpoint(cilium.io/v2) watch. namespace 가 없으면 클러스터 전체를 본다.
 */
export class KubernetesEndpointWatch implements EndpointWatch {
  private readonly logger = new Logger(KubernetesEndpointWatch.name);

  constructor(
    private readonly namespace: string | undefined,
    private readonly kubeConfig: KubeConfig = KubernetesEndpointWatch.loadDefaultConfig(),
  ) {}

  static loadDefaultConfig(): KubeConfig {
    const kubeConfig = new KubeConfig();
    kubeConfig.loadFromDefault();
    return kubeConfig;
  }

  get path(): string {
    return this.namespace
      ? `/apis/cilium.io/v2/namespaces/${this.namespace}/ciliumendpoints`
      : '/apis/cilium.io/v2/ciliumendpoints';
  }

  async watch(signal: AbortSignal, onChange: (change: EndpointChange) => void): Promise<void> {
    if (signal.aborted) {
      return;
    }
    const watch = new Watch(this.kubeConfig);

    await new Promise<void>((resolve, reject) => {
      let handle: unknown = null;
      const onAbort = () => {
        if (isAbortable(handle)) {
          handle.abort();
        }
        resolve();
      };
      signal.addEventListener('abort', onAbort, { once: true });

      watch
        .watch(
          this.path,
          {},
          (phase: string, apiObj: unknown) => {
            const type = WatchPhaseSchema.safeParse(phase);
            if (!type.success) {
              return;
            }
            const endpoint = parseCiliumEndpoint(apiObj);
            if (!endpoint) {
              this.logger.warn(`Dropping malformed CiliumEndpoint ${type.data} event`);
              return;
            }
            onChange({ type: type.data, endpoint });
          },
          (error: unknown) => {
            signal.removeEventListener('abort', onAbort);
            if (error && !signal.aborted) {
              reject(error);
            } else {
              resolve();
            }
          },
        )
        .then((request: unknown) => {
          handle = request;
          if (signal.aborted && isAbortable(handle)) {
            handle.abort();
          }
        })
        .catch((error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        });
    });
  }
}

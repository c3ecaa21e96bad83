import { Logger } from '@nestjs/common';
import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import { join } from 'path';

/** Hubble Relay flow 스트림. 스트림이 끝나면 resolve, 끊기면 reject 한다. */
export interface FlowStreamClient {
  streamFlows(signal: AbortSignal, onMessage: (message: unknown) => void): Promise<void>;
  close(): void;
}

const GET_FLOWS_SERVICE = 'observer.Observer';

const LOADER_OPTIONS: protoLoader.Options = {
  keepCase: true,
  longs: Number,
  enums: String,
  defaults: true,
  oneofs: true,
};

type GetFlowsMethod = protoLoader.MethodDefinition<object, object>;

function isMethodDefinition(value: unknown): value is GetFlowsMethod {
  return (
    typeof value === 'object' &&
    value !== null &&
    'path' in value &&
    typeof value.path === 'string' &&
    'requestSerialize' in value &&
    typeof value.requestSerialize === 'function' &&
    'responseDeserialize' in value &&
    typeof value.responseDeserialize === 'function'
  );
}

/** proto 디렉터리에서 observer.proto 를 읽어 GetFlows 메서드 정의를 꺼낸다. */
export function loadGetFlowsMethod(protoDir: string): GetFlowsMethod {
  const packageDefinition = protoLoader.loadSync(join(protoDir, 'observer.proto'), {
    ...LOADER_OPTIONS,
    includeDirs: [protoDir],
  });
  const service: unknown = packageDefinition[GET_FLOWS_SERVICE];
  const method = typeof service === 'object' && service !== null && 'GetFlows' in service ? service.GetFlows : undefined;
  if (!isMethodDefinition(method)) {
    throw new Error(`${GET_FLOWS_SERVICE}/GetFlows not found in ${protoDir}`);
  }
  return method;
}

/**
 * grpc-js 로 Hubble Relay 의 GetFlows(follow) 서버 스트림을 연다.
 * 채널은 재연결 사이에 재사용한다.
 */
export class HubbleRelayClient implements FlowStreamClient {
  private readonly logger = new Logger(HubbleRelayClient.name);
  private client: grpc.Client | null = null;
  private method: GetFlowsMethod | null = null;

  constructor(
    private readonly address: string,
    private readonly protoDir: string,
  ) {}

  async streamFlows(signal: AbortSignal, onMessage: (message: unknown) => void): Promise<void> {
    if (signal.aborted) {
      return;
    }
    const { client, method } = this.connection();
    this.logger.log(`Opening flow stream to Hubble Relay at ${this.address}`);

    await new Promise<void>((resolve, reject) => {
      const call = client.makeServerStreamRequest(
        method.path,
        method.requestSerialize,
        method.responseDeserialize,
        { follow: true },
        new grpc.Metadata(),
      );
      const onAbort = () => call.cancel();
      signal.addEventListener('abort', onAbort, { once: true });
      const settle = (error?: Error) => {
        signal.removeEventListener('abort', onAbort);
        if (error && !signal.aborted) {
          reject(error);
        } else {
          resolve();
        }
      };

      call.on('data', (message: unknown) => onMessage(message));
      call.on('error', (error: Error) => settle(error));
      call.on('end', () => settle());
    });
  }

  close(): void {
    this.client?.close();
    this.client = null;
  }

  private connection(): { client: grpc.Client; method: GetFlowsMethod } {
    if (!this.method) {
      this.method = loadGetFlowsMethod(this.protoDir);
    }
    if (!this.client) {
      this.client = new grpc.Client(this.address, grpc.credentials.createInsecure());
    }
    return { client: this.client, method: this.method };
  }
}

import { readFile } from 'fs/promises';
import { join } from 'path';
import si from 'systeminformation';
import type { Systeminformation } from 'systeminformation';
import type { InterfaceStatus } from '../../topology/topology.types';

export interface InterfaceCounters {
  rxBytes: number;
  txBytes: number;
  rxPackets: number;
  txPackets: number;
}

export interface MonitoredInterface {
  iface: string;
  /** 알 수 없으면 null. */
  speedMbps: number | null;
}

/** sysfs 소스가 커널 인터페이스 정보를 읽는 경계. 테스트에서는 가짜 구현을 쓴다. */
export interface InterfaceCounterReader {
  listInterfaces(): Promise<MonitoredInterface[]>;
  readCounters(iface: string): Promise<InterfaceCounters>;
  readOperState(iface: string): Promise<InterfaceStatus | null>;
}

const SYSFS_NET_PATH = '/sys/class/net';

/**
 * operstate 문자열을 링크 신호로 바꾼다.
 * unknown/dormant/testing 처럼 판단할 수 없는 값은 null (신호 없음).
 */
export function mapOperState(raw: string): InterfaceStatus | null {
  switch (raw.trim().toLowerCase()) {
    case 'up':
      return 'up';
    case 'down':
    case 'lowerlayerdown':
    case 'notpresent':
      return 'down';
    default:
      return null;
  }
}

/**
 * 인터페이스 목록은 systeminformation 으로, 카운터와 operstate 는 /sys/class/net 에서 직접 읽는다.
 */
export class SysfsCounterReader implements InterfaceCounterReader {
  constructor(private readonly basePath: string = SYSFS_NET_PATH) {}

  async listInterfaces(): Promise<MonitoredInterface[]> {
    const result = await si.networkInterfaces();
    const interfaces: Systeminformation.NetworkInterfacesData[] = Array.isArray(result) ? result : [result];
    return interfaces.map((entry) => ({
      iface: entry.iface,
      speedMbps: typeof entry.speed === 'number' && entry.speed > 0 ? entry.speed : null,
    }));
  }

  async readCounters(iface: string): Promise<InterfaceCounters> {
    const [rxBytes, txBytes, rxPackets, txPackets] = await Promise.all(
      ['rx_bytes', 'tx_bytes', 'rx_packets', 'tx_packets'].map((stat) =>
        this.readNumber(join(this.basePath, iface, 'statistics', stat)),
      ),
    );
    return { rxBytes, txBytes, rxPackets, txPackets };
  }

  async readOperState(iface: string): Promise<InterfaceStatus | null> {
    const raw = await this.readText(join(this.basePath, iface, 'operstate'));
    return raw === null ? null : mapOperState(raw);
  }

  /** 파일이 없으면 0. */
  private async readNumber(path: string): Promise<number> {
    const raw = await this.readText(path);
    const value = raw === null ? 0 : Number.parseInt(raw.trim(), 10);
    return Number.isFinite(value) ? value : 0;
  }

  private async readText(path: string): Promise<string | null> {
    try {
      return await readFile(path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENODEV' || error.code === 'ENOTDIR')
  );
}

import { SerialPort } from 'serialport';
import { PortInfo } from '../types/serial';

export interface PortFilterOptions {
  // 是否保留主板原生串口 (COM1 等)
  includeNativePorts?: boolean;
}

/**
 * 过滤掉 Windows 标准端口 (ACPI\PNP0501) 和没有 pnpId 的原生串口，
 * 只留下 USB 转串口等外接设备。
 */
export function filterPorts(ports: PortInfo[], opts?: PortFilterOptions): PortInfo[] {
  if (opts?.includeNativePorts) return ports;
  return ports.filter(p => {
    if (p.pnpId && p.pnpId.includes('ACPI') && p.pnpId.includes('PNP0501')) {
      return false;
    }
    if (p.manufacturer && (p.manufacturer.includes('标准端口类型') || p.manufacturer.includes('Standard port types'))) {
      return false;
    }
    if (!p.pnpId) {
      return false;
    }
    return true;
  });
}

export async function listSerialPorts(opts?: PortFilterOptions): Promise<PortInfo[]> {
  const ports = await SerialPort.list();
  const infos: PortInfo[] = ports.map(p => ({
    path: p.path,
    manufacturer: p.manufacturer,
    serialNumber: p.serialNumber,
    pnpId: p.pnpId,
    locationId: p.locationId,
    productId: p.productId,
    vendorId: p.vendorId
  }));
  return filterPorts(infos, opts);
}

// 串口相关的类型和接口

export type Parity = 'none' | 'even' | 'mark' | 'odd' | 'space';

// 串口配置参数
export interface SerialConfig {
  path: string;
  baudRate: number;
  dataBits?: 8 | 7 | 6 | 5;
  stopBits?: 1 | 2;
  parity?: Parity;
}

// 串口信息 (用于列表展示)
export interface PortInfo {
  path: string;
  manufacturer?: string;
  serialNumber?: string;
  pnpId?: string;
  locationId?: string;
  productId?: string;
  vendorId?: string;
}

// GET /ports 返回项
export interface PortListing extends PortInfo {
  busy: boolean;
  boardId?: number;
}

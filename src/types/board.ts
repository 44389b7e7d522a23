// 单板监控相关的类型定义

export type BoardState =
  | 'idle'
  | 'listening'
  | 'active'
  | 'flashed'
  | 'timedOut'
  | 'errored'
  | 'terminated';

export type FlashedSource = 'marker' | 'timer';

export interface Board {
  readonly id: number;
  readonly path: string;
  readonly baudRate: number;
}

export interface LineReceivedEvent {
  type: 'line';
  boardId: number;
  text: string;
  receivedAt: number;
}

export interface DecodeErrorEvent {
  type: 'decodeError';
  boardId: number;
  message: string;
}

export interface PortErrorEvent {
  type: 'portError';
  boardId: number;
  message: string;
}

export interface FirstTransmissionEvent {
  type: 'firstTransmission';
  boardId: number;
}

export interface FlashedEvent {
  type: 'flashed';
  boardId: number;
  source: FlashedSource;
}

export interface ProgressEvent {
  type: 'progress';
  boardId: number;
  percent: number;
}

export interface ElapsedEvent {
  type: 'elapsed';
  boardId: number;
  elapsedMs: number;
  text: string;
}

export interface StateEvent {
  type: 'state';
  boardId: number;
  state: BoardState;
}

export type BoardEvent =
  | LineReceivedEvent
  | DecodeErrorEvent
  | PortErrorEvent
  | FirstTransmissionEvent
  | FlashedEvent
  | ProgressEvent
  | ElapsedEvent
  | StateEvent;

export type BoardEventListener = (event: BoardEvent) => void;

// 供 API / WS 展示的快照
export interface BoardSnapshot {
  id: number;
  path: string;
  baudRate: number;
  state: BoardState;
  progressPercent: number;
  elapsedMs: number;
  elapsedText: string;
  lineCount: number;
  firstTransmissionAt?: number;
  flashedAt?: number;
  flashedBy?: FlashedSource;
  lastError?: string;
}

/**
 * AgentSession 상태와 세션 이벤트 계약.
 *
 * Runtime은 이 이벤트의 발행자이며, 외부 관측자(알림 싱크, 메트릭 싱크)는 구독자이다.
 */

import type { JsonValue } from "./json.js";

export type SessionState = "uninitialized" | "initializing" | "ready" | "closing" | "closed";

export const SESSION_STATES: readonly SessionState[] = [
  "uninitialized",
  "initializing",
  "ready",
  "closing",
  "closed",
];

export function isSessionState(value: unknown): value is SessionState {
  if (typeof value !== "string") {
    return false;
  }

  return SESSION_STATES.some((state) => state === value);
}

export type SessionEventType =
  | "session.state_changed"
  | "protocol.anomaly"
  | "frame.error"
  | "heartbeat.succeeded"
  | "heartbeat.failed"
  | "metrics.snapshot"
  | "peer.stderr"
  | "peer.exited";

export interface SessionEventBase {
  /** 이벤트 종류 (discriminant) */
  type: SessionEventType;

  /** ISO 8601 타임스탬프 */
  timestamp: string;
}

export interface SessionStateChangedEvent extends SessionEventBase {
  type: "session.state_changed";
  from: SessionState;
  to: SessionState;
  /** 전이 원인 (예: "handshake_completed", "transport_closed") */
  reason: string;
}

export interface ProtocolAnomalyEvent extends SessionEventBase {
  type: "protocol.anomaly";
  /** 대기 중인 요청과 매칭되지 않은 응답 id */
  responseId: string | number | null;
  message: string;
}

export interface FrameErrorEvent extends SessionEventBase {
  type: "frame.error";
  code: string;
  message: string;
  /** true면 리더가 더 이상 프레임을 읽지 않는다 */
  fatal: boolean;
}

export interface HeartbeatSucceededEvent extends SessionEventBase {
  type: "heartbeat.succeeded";
  /** 왕복 시간 (밀리초) */
  roundTripMs: number;
}

export interface HeartbeatFailedEvent extends SessionEventBase {
  type: "heartbeat.failed";
  consecutiveFailures: number;
  errorMessage: string;
}

export interface SessionMetricsSnapshot {
  state: SessionState;
  pid: number;
  /** 세션 시작 이후 경과 시간 (밀리초) */
  uptimeMs: number;
  pendingRequests: number;
  requestsSent: number;
  responsesMatched: number;
  requestTimeouts: number;
  protocolAnomalies: number;
  frameErrors: number;
  notificationsReceived: number;
  heartbeatFailures: number;
  toolCount: number;
}

export interface MetricsSnapshotEvent extends SessionEventBase {
  type: "metrics.snapshot";
  snapshot: SessionMetricsSnapshot;
}

export interface PeerStderrEvent extends SessionEventBase {
  type: "peer.stderr";
  line: string;
}

export interface PeerExitedEvent extends SessionEventBase {
  type: "peer.exited";
  code: number | null;
  signal: string | null;
}

export type SessionEvent =
  | SessionStateChangedEvent
  | ProtocolAnomalyEvent
  | FrameErrorEvent
  | HeartbeatSucceededEvent
  | HeartbeatFailedEvent
  | MetricsSnapshotEvent
  | PeerStderrEvent
  | PeerExitedEvent;

export type SessionEventOf<T extends SessionEventType> = Extract<SessionEvent, { type: T }>;

export function metricsSnapshotToJson(snapshot: SessionMetricsSnapshot): { [key: string]: JsonValue } {
  return {
    state: snapshot.state,
    pid: snapshot.pid,
    uptimeMs: snapshot.uptimeMs,
    pendingRequests: snapshot.pendingRequests,
    requestsSent: snapshot.requestsSent,
    responsesMatched: snapshot.responsesMatched,
    requestTimeouts: snapshot.requestTimeouts,
    protocolAnomalies: snapshot.protocolAnomalies,
    frameErrors: snapshot.frameErrors,
    notificationsReceived: snapshot.notificationsReceived,
    heartbeatFailures: snapshot.heartbeatFailures,
    toolCount: snapshot.toolCount,
  };
}

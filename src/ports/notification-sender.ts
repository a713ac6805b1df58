export interface NotificationSendInput {
  url: string;
  headers: Record<string, string>;
  body: string;
  timeoutMs: number;
}

export interface NotificationSendResult {
  ok: boolean;
  statusCode?: number;
  errorCode?: string;
}

export interface NotificationSenderPort {
  send(input: NotificationSendInput): Promise<NotificationSendResult>;
}

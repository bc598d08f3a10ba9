import type { NotificationEvent } from "./notification.js";

export type JobType = "process-document" | "notify";

export interface ProcessDocumentJobData {
  type: "process-document";
  documentId: string;
}

export interface NotificationJobData {
  type: "notify";
  event: NotificationEvent;
}

export type AnyJobData = ProcessDocumentJobData | NotificationJobData;

export interface DeadLetterEntry {
  documentId: string;
  stage: string;
  failureReason: string;
  failedAt: Date;
}

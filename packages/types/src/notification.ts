export type NotificationPriority = "low" | "medium" | "high" | "critical";

export interface TriggerCategoryDefinition {
  name: string;
  phrases: string[];
  threshold: number;
  priority: NotificationPriority;
  recipients: string[];
}

export interface TriggerCategory extends TriggerCategoryDefinition {
  /** Mean of the phrase embeddings. */
  vector: number[];
  model: string;
  refreshedAt: Date;
}

export interface NotificationEvent {
  id: string;
  category: string;
  similarity: number;
  chunkId: string;
  documentId: string;
  priority: NotificationPriority;
  recipients: string[];
  title: string;
  message: string;
  createdAt: Date;
}

/**
 * Notification Domain Model
 *
 * Short messages for a user about something that happened in one of their
 * classes. referenceId points at the assignment or class concerned.
 */

export type NotificationType = "assignment" | "submission" | "grade" | "enrollment";

export interface Notification {
  id: string;
  userId: string;
  message: string;
  type: NotificationType;
  referenceId: string | null;
  isRead: boolean;
  createdAt: string;
}

export interface CreateNotificationInput {
  userId: string;
  message: string;
  type: NotificationType;
  referenceId?: string | null;
}

import { randomUUID } from "crypto";
import { JsonTable } from "./jsonTable";
import { CreateNotificationInput, Notification } from "../domain/notification";

/**
 * NotificationStore persists per-user notifications in notifications.json.
 */
export class NotificationStore {
  private table: JsonTable<Notification>;

  constructor(dataDir: string) {
    this.table = new JsonTable<Notification>(dataDir, "notifications.json");
  }

  /**
   * Create one notification per input in a single write
   */
  createMany(inputs: CreateNotificationInput[]): Notification[] {
    if (inputs.length === 0) {
      return [];
    }

    const notifications = this.table.read();
    const now = new Date().toISOString();
    const created = inputs.map((input) => ({
      id: randomUUID(),
      userId: input.userId,
      message: input.message,
      type: input.type,
      referenceId: input.referenceId ?? null,
      isRead: false,
      createdAt: now,
    }));

    this.table.write([...notifications, ...created]);
    return created;
  }

  create(input: CreateNotificationInput): Notification {
    return this.createMany([input])[0];
  }

  /**
   * All notifications for a user, newest first
   */
  findByUser(userId: string): Notification[] {
    return this.table
      .read()
      .filter((n) => n.userId === userId)
      .reverse()
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  countUnread(userId: string): number {
    return this.table.read().filter((n) => n.userId === userId && !n.isRead).length;
  }

  /**
   * Mark every unread notification of a user as read. Returns how many changed.
   */
  markAllRead(userId: string): number {
    const notifications = this.table.read();
    let changed = 0;
    for (const notification of notifications) {
      if (notification.userId === userId && !notification.isRead) {
        notification.isRead = true;
        changed++;
      }
    }
    if (changed > 0) {
      this.table.write(notifications);
    }
    return changed;
  }
}

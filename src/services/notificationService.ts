/**
 * Notification Service
 *
 * Tells users what happened in their classes: a new assignment, a
 * submission to grade, a grade received, an enrollment.
 */

import { ServiceContext } from "./context";
import { Assignment } from "../domain/assignment";
import { Class } from "../domain/class";
import { Notification } from "../domain/notification";
import { displayName, User } from "../domain/user";

export class NotificationService {
  constructor(private readonly ctx: ServiceContext) {}

  assignmentCreated(assignment: Assignment, participantIds: string[]): Notification[] {
    return this.ctx.stores.notifications.createMany(
      participantIds.map((userId) => ({
        userId,
        message: `New assignment: ${assignment.title}`,
        type: "assignment" as const,
        referenceId: assignment.id,
      }))
    );
  }

  submissionReceived(assignment: Assignment, classObj: Class, participant: User): Notification {
    return this.ctx.stores.notifications.create({
      userId: classObj.organizerId,
      message: `${displayName(participant)} submitted "${assignment.title}"`,
      type: "submission",
      referenceId: assignment.id,
    });
  }

  gradeUpdated(assignment: Assignment, participantId: string, score: number): Notification {
    return this.ctx.stores.notifications.create({
      userId: participantId,
      message: `Your grade for "${assignment.title}" is now ${score}`,
      type: "grade",
      referenceId: assignment.id,
    });
  }

  enrolled(classObj: Class, participantId: string): Notification {
    return this.ctx.stores.notifications.create({
      userId: participantId,
      message: `You were enrolled in ${classObj.name}`,
      type: "enrollment",
      referenceId: classObj.id,
    });
  }

  /**
   * The user's notifications, newest first. Viewing them marks them read;
   * the returned list still shows which ones were unread.
   */
  listForUser(actor: User): Notification[] {
    const notifications = this.ctx.stores.notifications.findByUser(actor.id);
    this.ctx.stores.notifications.markAllRead(actor.id);
    return notifications;
  }

  unreadCount(actor: User): number {
    return this.ctx.stores.notifications.countUnread(actor.id);
  }
}

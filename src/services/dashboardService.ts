/**
 * Dashboard Service
 *
 * The landing view after login. Organizers see the classes they own;
 * participants see their classes, their grades and what is due next.
 */

import { ServiceContext } from "./context";
import { ClassService } from "./classService";
import { GradeService } from "./gradeService";
import { Assignment } from "../domain/assignment";
import { ClassSummary } from "../domain/class";
import { GradeView } from "../domain/grade";
import { PublicUser, toPublicUser, User } from "../domain/user";

export interface OrganizerDashboard {
  role: "organizer";
  user: PublicUser;
  classes: ClassSummary[];
  unreadNotifications: number;
}

export interface UpcomingAssignment {
  assignment: Assignment;
  className: string;
  submitted: boolean;
}

export interface ParticipantDashboard {
  role: "participant";
  user: PublicUser;
  classes: ClassSummary[];
  grades: GradeView[];
  upcoming: UpcomingAssignment[];
  unreadNotifications: number;
}

export type Dashboard = OrganizerDashboard | ParticipantDashboard;

export class DashboardService {
  private classService: ClassService;
  private gradeService: GradeService;

  constructor(private readonly ctx: ServiceContext) {
    this.classService = new ClassService(ctx);
    this.gradeService = new GradeService(ctx);
  }

  forUser(actor: User): Dashboard {
    const classes = this.classService.listForUser(actor);
    const unreadNotifications = this.ctx.stores.notifications.countUnread(actor.id);

    if (actor.role === "organizer") {
      return { role: "organizer", user: toPublicUser(actor), classes, unreadNotifications };
    }

    return {
      role: "participant",
      user: toPublicUser(actor),
      classes,
      grades: this.gradeService.listOwn(actor),
      upcoming: this.upcoming(actor, classes),
      unreadNotifications,
    };
  }

  /**
   * Assignments not yet past due in the participant's classes, soonest first
   */
  private upcoming(actor: User, classes: ClassSummary[]): UpcomingAssignment[] {
    const now = this.ctx.now().getTime();
    const submitted = new Set(
      this.ctx.stores.submissions.findByParticipant(actor.id).map((s) => s.assignmentId)
    );

    const items: UpcomingAssignment[] = [];
    for (const classSummary of classes) {
      for (const assignment of this.ctx.stores.assignments.findByClass(classSummary.id)) {
        if (assignment.dueAt && new Date(assignment.dueAt).getTime() >= now) {
          items.push({
            assignment,
            className: classSummary.name,
            submitted: submitted.has(assignment.id),
          });
        }
      }
    }

    return items.sort((a, b) => (a.assignment.dueAt ?? "").localeCompare(b.assignment.dueAt ?? ""));
  }
}

/**
 * Services Index
 *
 * Build every service over one ServiceContext.
 */

import { ServiceContext } from "./context";
import { AccountService } from "./accountService";
import { ClassService } from "./classService";
import { EnrollmentService } from "./enrollmentService";
import { AssignmentService } from "./assignmentService";
import { SubmissionService } from "./submissionService";
import { GradeService } from "./gradeService";
import { NotificationService } from "./notificationService";
import { DashboardService } from "./dashboardService";

export interface Services {
  accounts: AccountService;
  classes: ClassService;
  enrollments: EnrollmentService;
  assignments: AssignmentService;
  submissions: SubmissionService;
  grades: GradeService;
  notifications: NotificationService;
  dashboard: DashboardService;
}

export function createServices(ctx: ServiceContext): Services {
  return {
    accounts: new AccountService(ctx),
    classes: new ClassService(ctx),
    enrollments: new EnrollmentService(ctx),
    assignments: new AssignmentService(ctx),
    submissions: new SubmissionService(ctx),
    grades: new GradeService(ctx),
    notifications: new NotificationService(ctx),
    dashboard: new DashboardService(ctx),
  };
}

export type { ServiceContext } from "./context";
export { AccountService } from "./accountService";
export { ClassService } from "./classService";
export { EnrollmentService } from "./enrollmentService";
export { AssignmentService } from "./assignmentService";
export { SubmissionService } from "./submissionService";
export { GradeService } from "./gradeService";
export { NotificationService } from "./notificationService";
export { DashboardService } from "./dashboardService";

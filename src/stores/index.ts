/**
 * Stores
 *
 * The handle every service receives. Opened once for a data directory and
 * passed down explicitly; no store lives in a module-level global.
 */

import { UserStore } from "./userStore";
import { ClassStore } from "./classStore";
import { EnrollmentStore } from "./enrollmentStore";
import { AssignmentStore } from "./assignmentStore";
import { SubmissionStore } from "./submissionStore";
import { GradeStore } from "./gradeStore";
import { NotificationStore } from "./notificationStore";

export interface Stores {
  users: UserStore;
  classes: ClassStore;
  enrollments: EnrollmentStore;
  assignments: AssignmentStore;
  submissions: SubmissionStore;
  grades: GradeStore;
  notifications: NotificationStore;
}

export function openStores(dataDir: string): Stores {
  return {
    users: new UserStore(dataDir),
    classes: new ClassStore(dataDir),
    enrollments: new EnrollmentStore(dataDir),
    assignments: new AssignmentStore(dataDir),
    submissions: new SubmissionStore(dataDir),
    grades: new GradeStore(dataDir),
    notifications: new NotificationStore(dataDir),
  };
}

export {
  UserStore,
  ClassStore,
  EnrollmentStore,
  AssignmentStore,
  SubmissionStore,
  GradeStore,
  NotificationStore,
};
export type { UpsertResult } from "./submissionStore";

/**
 * Seed script with a demo organizer, a few participants, one class and
 * some graded work, for trying the API by hand.
 *
 * Run with: npm run seed
 * Every demo account uses the password "demo-password".
 */

import { loadConfig } from "../config";
import { openStores, Stores } from "../stores";
import { LocalArtifactStorage } from "../storage/artifactStorage";
import { createServices, Services } from "../services";
import { Role, User } from "../domain/user";

const DEMO_PASSWORD = "demo-password";

const demoParticipants = [
  { username: "avery", firstName: "Avery", lastName: "Stone" },
  { username: "jordan", firstName: "Jordan", lastName: "Reyes" },
  { username: "casey", firstName: "Casey", lastName: "Nguyen" },
];

function ensureUser(
  stores: Stores,
  services: Services,
  username: string,
  firstName: string,
  lastName: string,
  role: Role
): User {
  const existing = stores.users.findByUsername(username);
  if (existing) {
    console.log(`  User "${username}" already exists`);
    return existing;
  }

  const user = services.accounts.register({
    username,
    email: `${username}@example.com`,
    password: DEMO_PASSWORD,
    firstName,
    lastName,
    role,
  });
  console.log(`  Created ${role} "${username}"`);
  return user;
}

async function seed(): Promise<void> {
  const config = loadConfig();
  const stores = openStores(config.dataDir);
  const services = createServices({
    stores,
    storage: new LocalArtifactStorage(config.uploadDir),
    allowSelfEnrollment: config.allowSelfEnrollment,
    maxUploadBytes: config.maxUploadBytes,
    now: () => new Date(),
  });

  console.log("Seeding users...");
  const organizer = ensureUser(stores, services, "demo-organizer", "Dana", "Fields", "organizer");
  const participants = demoParticipants.map((p) =>
    ensureUser(stores, services, p.username, p.firstName, p.lastName, "participant")
  );

  if (services.classes.listForUser(organizer).length > 0) {
    console.log("Demo class already exists, nothing else to do.");
    return;
  }

  console.log("Seeding class and assignments...");
  const algebra = services.classes.create(organizer, { name: "Algebra", subject: "Mathematics" });
  for (const participant of participants) {
    services.enrollments.enroll(organizer, algebra.id, { participantId: participant.id });
  }

  const inAWeek = new Date(Date.now() + 7 * 24 * 60 * 60 * 1000).toISOString();
  const homework = services.assignments.create(organizer, algebra.id, {
    title: "HW1: Linear equations",
    description: "Problems 1-20 on page 42",
    category: "homework",
    dueDate: inAWeek,
  });
  services.assignments.create(organizer, algebra.id, {
    title: "Quiz: Slopes",
    category: "quiz",
  });

  await services.submissions.submit(participants[0], homework.id, {
    text: "All twenty problems, worked solutions attached.",
    file: { originalName: "hw1.txt", bytes: Buffer.from("1) x = 4\n2) x = -3\n") },
  });
  services.grades.grade(organizer, homework.id, participants[0].id, {
    score: 85,
    feedback: "Good work",
    rating: 4,
  });

  console.log(`Done. Log in as "demo-organizer" with password "${DEMO_PASSWORD}".`);
}

seed().catch((error) => {
  console.error("Seeding failed:", error);
  process.exit(1);
});

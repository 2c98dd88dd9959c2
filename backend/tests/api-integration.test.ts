import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../app';
import { loadEnvironment } from '../config/environment';
import {
  TEST_TODAY,
  clearTestDatabase,
  connectTestDatabase,
  disconnectTestDatabase,
  seedAcademicFixtures,
  testClock,
  type TestDatabase
} from '../config/test-database';

const CS101_FALL_2024 = { courseId: 'CS101', sectionId: 'A', semester: 'Fall', year: 2024 };
const CS101_PATH = '/CS101/A/Fall/2024';

/**
 * HTTP surface tests: status codes and error bodies over the in-memory store
 */
describe('Academic records API', () => {
  let db: TestDatabase;
  let app: Express;

  beforeAll(() => {
    db = connectTestDatabase();
    app = createApp(db.store, {
      clock: testClock,
      environment: loadEnvironment({ STORE_DRIVER: 'memory', LOG_LEVEL: 'silent' })
    });
  });

  beforeEach(async () => {
    await clearTestDatabase(db);
    await seedAcademicFixtures(db.services);
  });

  afterAll(async () => {
    await disconnectTestDatabase(db);
  });

  it('should report health with the configured store', async () => {
    const response = await request(app).get('/health').expect(200);

    expect(response.body.status).toBe('ok');
    expect(response.body.store).toBe('memory');
  });

  describe('enrollments', () => {
    it('should enroll a student and take a seat', async () => {
      const response = await request(app)
        .post('/api/enrollments')
        .send({ studentId: 1, ...CS101_FALL_2024 })
        .expect(201);

      expect(response.body).toEqual({
        studentId: 1,
        ...CS101_FALL_2024,
        cancelled: false,
        grade: null,
        enrollmentDate: TEST_TODAY
      });

      const section = await request(app).get(`/api/sections${CS101_PATH}`).expect(200);
      expect(section.body.enrolled).toBe(1);
    });

    it('should answer a duplicate enrollment with 409', async () => {
      await request(app).post('/api/enrollments').send({ studentId: 1, ...CS101_FALL_2024 }).expect(201);

      const response = await request(app)
        .post('/api/enrollments')
        .send({ studentId: 1, ...CS101_FALL_2024 })
        .expect(409);

      expect(response.body.error.type).toBe('DUPLICATE_ENROLLMENT');
      expect(response.body.error.userFriendlyMessage).toBe('The student is already enrolled in this section.');
    });

    it('should answer an unmet prerequisite with 422', async () => {
      const response = await request(app)
        .post('/api/enrollments')
        .send({ studentId: 1, courseId: 'CS201', sectionId: 'A', semester: 'Fall', year: 2025 })
        .expect(422);

      expect(response.body.error.message).toBe('Course CS201 requires a passing grade in: CS101');
      expect(response.body.context).toEqual({ resourceType: 'Course', resourceId: 'CS201' });
    });

    it('should grade, report GPA and cancel through the enrollment path', async () => {
      await request(app).post('/api/enrollments').send({ studentId: 1, ...CS101_FALL_2024 }).expect(201);

      const rejected = await request(app).put(`/api/enrollments/1${CS101_PATH}/grade`).send({ grade: 'E' }).expect(400);
      expect(rejected.body.error.type).toBe('INCORRECT_VALUE');

      const graded = await request(app).put(`/api/enrollments/1${CS101_PATH}/grade`).send({ grade: 'A' }).expect(200);
      expect(graded.body.grade).toBe('A');

      const gpa = await request(app).get('/api/students/1/gpa').expect(200);
      expect(gpa.body).toEqual({ studentId: 1, gpa: 4, gradedCredits: 3, qualityPoints: 12 });

      const cancelled = await request(app).post(`/api/enrollments/1${CS101_PATH}/cancel`).expect(200);
      expect(cancelled.body.cancelled).toBe(true);

      const roster = await request(app).get(`/api/sections${CS101_PATH}/roster`).expect(200);
      expect(roster.body).toEqual([]);
    });
  });

  describe('validation', () => {
    it('should reject a malformed email with 400', async () => {
      const response = await request(app)
        .post('/api/students')
        .send({
          firstName: 'Carol',
          lastName: 'Diaz',
          departmentName: 'Math',
          email: 'carol.university.edu',
          enrollmentDate: '2024-09-01'
        })
        .expect(400);

      expect(response.body.error.type).toBe('INVALID_EMAIL');
      expect(response.body.error.message).toBe("'carol.university.edu' is not a valid email address");
    });

    it('should reject a malformed time slot with 400', async () => {
      const response = await request(app)
        .post('/api/sections')
        .send({ courseId: 'CS101', sectionId: 'B', semester: 'Fall', year: 2024, timeSlot: 'MM 09:00-10:00', capacity: 5 })
        .expect(400);

      expect(response.body.error.type).toBe('INCORRECT_TIMESLOT');
    });

    it('should reject a body that is not JSON', async () => {
      const response = await request(app)
        .post('/api/students')
        .set('Content-Type', 'application/json')
        .send('{"firstName":')
        .expect(400);

      expect(response.body.error.message).toBe('Request body is not valid JSON');
    });

    it('should answer an unknown route with 404', async () => {
      const response = await request(app).get('/api/nowhere').expect(404);

      expect(response.body.error.message).toBe("Route with identifier 'GET /api/nowhere' not found");
    });
  });

  describe('catalog and people', () => {
    it('should refuse to delete a department in use', async () => {
      const response = await request(app).delete('/api/departments/Math').expect(409);

      expect(response.body.error.type).toBe('DATABASE_ERROR');
      expect(response.body.error.message).toBe("restrict constraint 'department_referenced' violated on department");
    });

    it('should read a department whose name needs encoding', async () => {
      const response = await request(app).get(`/api/departments/${encodeURIComponent('Comp. Sci.')}`).expect(200);

      expect(response.body.building).toBe('Taylor');
    });

    it('should add and list prerequisites', async () => {
      await request(app).post('/api/courses/MATH101/prerequisites').send({ prereqId: 'CS101' }).expect(201);

      const response = await request(app).get('/api/courses/MATH101/prerequisites').expect(200);
      expect(response.body).toEqual([{ courseId: 'MATH101', prereqId: 'CS101' }]);
    });

    it('should assign and read an advisor', async () => {
      await request(app).put('/api/advisors/1').send({ instructorId: 1, startDate: '2024-09-01' }).expect(200);

      const response = await request(app).get('/api/advisors/1').expect(200);
      expect(response.body).toEqual({
        advisor: { studentId: 1, instructorId: 1, startDate: '2024-09-01', endDate: null }
      });
    });

    it('should assign an instructor and show the workload', async () => {
      await request(app).post(`/api/sections${CS101_PATH}/instructors`).send({ instructorId: 1 }).expect(201);

      const response = await request(app).get('/api/instructors/1/workload').expect(200);
      expect(response.body).toEqual([
        { courseId: 'CS101', sectionId: 'A', semester: 'Fall', year: 2024, timeSlot: 'MWF 09:00-09:50', room: 'T-101' }
      ]);
    });
  });

  describe('monitoring', () => {
    it('should summarize recent operations', async () => {
      const response = await request(app).get('/api/monitoring').expect(200);

      expect(response.body.timeframe).toBe('24 hours');
      expect(typeof response.body.operations.totalEvents).toBe('number');
    });

    it('should reject a non-positive window', async () => {
      const response = await request(app).get('/api/monitoring?hours=0').expect(400);

      expect(response.body.error.type).toBe('INCORRECT_VALUE');
    });
  });
});

import request from "supertest";
import { beforeEach, describe, expect, it } from "vitest";
import App from "@/app";
import { createAuthenticator } from "@/shared/middleware/auth.middleware";
import { createRateLimiters } from "@/shared/middleware/rate-limit.middleware";
import { BookingService } from "@/domains/appointments/services/booking.service";
import { ConflictCheckerService } from "@/domains/appointments/services/conflict-checker.service";
import { FakePaymentGateway, RecordingNotifier } from "./helpers/fakes";
import {
  InMemoryAppointmentStore,
  InMemoryCacheStore,
  InMemoryClinicStore,
  InMemoryDoctorStore,
} from "./helpers/in-memory-stores";
import { TEST_JWT_SECRET, admin, buildClinic, buildDoctor, doctorActor, patient, signToken } from "./helpers/builders";

const DOCTOR = "0b6f1c2e-8a4d-4f3b-9c71-5d2e8f9a1b01";
const PATIENT = "7c3e9a12-4b5d-4e6f-8a9b-0c1d2e3f4a02";
const OTHER_PATIENT = "9e8d7c6b-5a49-4382-9716-5f4e3d2c1b03";

const NOW = new Date("2025-03-01T08:00:00Z");

describe("HTTP API", () => {
  let appointments: InMemoryAppointmentStore;
  let health: Record<string, boolean>;
  let app: App["app"];

  const bearer = (token: string) => ({ Authorization: `Bearer ${token}` });
  const asPatient = bearer(signToken(patient(PATIENT)));
  const asOtherPatient = bearer(signToken(patient(OTHER_PATIENT)));
  const asDoctor = bearer(signToken(doctorActor(DOCTOR)));
  const asAdmin = bearer(signToken(admin()));

  const book = (headers: Record<string, string>, body: Record<string, unknown> = {}) =>
    request(app)
      .post("/api/v1/appointments")
      .set(headers)
      .send({ doctorId: DOCTOR, type: "online", preferredStartTime: "2025-03-01T10:00:00Z", ...body });

  beforeEach(() => {
    appointments = new InMemoryAppointmentStore();
    health = { database: true, redis: true };
    const cache = new InMemoryCacheStore();

    const bookingService = new BookingService({
      appointments,
      doctors: new InMemoryDoctorStore([buildDoctor({ id: DOCTOR })]),
      clinics: new InMemoryClinicStore([buildClinic()]),
      conflictChecker: new ConflictCheckerService(appointments),
      notifier: new RecordingNotifier(),
      paymentGateway: new FakePaymentGateway(),
      now: () => NOW,
    });

    app = new App({
      bookingService,
      auth: createAuthenticator({ secret: TEST_JWT_SECRET, blacklist: cache }),
      limiters: createRateLimiters(cache, { windowMs: 60_000, maxRequests: 100 }),
      healthCheck: async () => health,
      swaggerEnabled: false,
    }).getApp();
  });

  describe("GET /health", () => {
    it("reports healthy backing services", async () => {
      const response = await request(app).get("/health");

      expect(response.status).toBe(200);
      expect(response.body.message).toBe("Service is healthy");
      expect(response.body.data.services).toEqual({ database: true, redis: true });
    });

    it("reports a degraded service with 503", async () => {
      health = { database: true, redis: false };

      const response = await request(app).get("/health");

      expect(response.status).toBe(503);
      expect(response.body.success).toBe(false);
      expect(response.body.message).toBe("Service is degraded");
    });
  });

  describe("correlation ids", () => {
    it("echoes a well-formed id and replaces a malformed one", async () => {
      const kept = await request(app).get("/health").set("X-Correlation-ID", "req-123");
      const replaced = await request(app).get("/health").set("X-Correlation-ID", "not a valid id!");

      expect(kept.headers["x-correlation-id"]).toBe("req-123");
      expect(replaced.headers["x-correlation-id"]).toMatch(/^[a-z0-9]+-[a-f0-9]{12}$/);
    });
  });

  describe("POST /api/v1/appointments", () => {
    it("requires authentication", async () => {
      const response = await request(app).post("/api/v1/appointments").send({});

      expect(response.status).toBe(401);
      expect(response.body.code).toBe("UNAUTHORIZED");
    });

    it("books for the calling patient", async () => {
      const response = await book(asPatient, { userId: OTHER_PATIENT });

      expect(response.status).toBe(201);
      expect(response.body.message).toBe("Appointment booked successfully");
      expect(response.body.data.paymentUrl).toBe("https://checkout.test/pay?order_id=order_1");
      expect(response.body.data.appointment).toMatchObject({
        userId: PATIENT,
        doctorId: DOCTOR,
        status: "pending",
        startTime: "2025-03-01T10:00:00.000Z",
        endTime: "2025-03-01T10:30:00.000Z",
      });
    });

    it("answers a double booking with 409", async () => {
      await book(asPatient);

      const response = await book(asOtherPatient, { preferredStartTime: "2025-03-01T10:15:00Z" });

      expect(response.status).toBe(409);
      expect(response.body).toEqual({
        success: false,
        message: "The requested time slot is already booked",
        code: "TIME_SLOT_OCCUPIED",
      });
    });

    it("validates the body", async () => {
      const response = await book(asPatient, { preferredStartTime: "tomorrow morning" });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe("Request validation failed");
      expect(response.body.errors).toEqual([
        {
          field: "preferredStartTime",
          message: "Must be an ISO 8601 date-time with a time zone",
          code: "invalid_string",
        },
      ]);
    });

    it("needs a patient when an admin books", async () => {
      const response = await book(asAdmin);

      expect(response.status).toBe(400);
      expect(response.body.message).toBe("userId is required when booking for a patient");
    });
  });

  describe("appointment lifecycle", () => {
    const bookedId = async (): Promise<string> => {
      const response = await book(asPatient);
      return response.body.data.appointment.id;
    };

    it("lets the patient read and cancel their appointment", async () => {
      const id = await bookedId();

      const read = await request(app).get(`/api/v1/appointments/${id}`).set(asPatient);
      const hidden = await request(app).get(`/api/v1/appointments/${id}`).set(asOtherPatient);
      const cancelled = await request(app)
        .post(`/api/v1/appointments/${id}/cancel`)
        .set(asPatient)
        .send({ reason: "patient_request" });

      expect(read.status).toBe(200);
      expect(read.body.data.id).toBe(id);
      expect(hidden.status).toBe(403);
      expect(hidden.body.code).toBe("UNAUTHORIZED_ACCESS");
      expect(cancelled.status).toBe(200);
      expect(cancelled.body.data.appointment.status).toBe("cancelled");
    });

    it("keeps clinical actions away from patients", async () => {
      const id = await bookedId();
      await request(app).post(`/api/v1/appointments/${id}/confirm`).set(asPatient);

      const byPatient = await request(app).post(`/api/v1/appointments/${id}/start`).set(asPatient);
      const byDoctor = await request(app).post(`/api/v1/appointments/${id}/start`).set(asDoctor);

      expect(byPatient.status).toBe(403);
      expect(byPatient.body.message).toBe("Insufficient permissions");
      expect(byDoctor.status).toBe(200);
      expect(byDoctor.body.data.appointment.status).toBe("in_progress");
    });

    it("reports state conflicts with 422", async () => {
      const id = await bookedId();

      const response = await request(app).post(`/api/v1/appointments/${id}/complete`).set(asDoctor).send({});

      expect(response.status).toBe(422);
      expect(response.body.code).toBe("INVALID_STATE");
    });

    it("lists the patient's appointments", async () => {
      const id = await bookedId();

      const response = await request(app).get("/api/v1/appointments").set(asPatient);

      expect(response.status).toBe(200);
      expect(response.body.data.map((appointment: { id: string }) => appointment.id)).toEqual([id]);
    });

    it("rejects malformed ids", async () => {
      const response = await request(app).get("/api/v1/appointments/not-a-uuid").set(asPatient);

      expect(response.status).toBe(400);
      expect(response.body.message).toBe("Parameter validation failed");
    });

    it("lets only admins delete", async () => {
      const id = await bookedId();

      const byPatient = await request(app).delete(`/api/v1/appointments/${id}`).set(asPatient);
      const byAdmin = await request(app).delete(`/api/v1/appointments/${id}`).set(asAdmin);

      expect(byPatient.status).toBe(403);
      expect(byAdmin.status).toBe(200);
      expect(byAdmin.body.message).toBe("Appointment deleted");
      expect(appointments.snapshot(id)?.deletedAt).toEqual(NOW);
    });
  });

  describe("doctor routes", () => {
    it("lists a day's free slots", async () => {
      const response = await request(app)
        .get(`/api/v1/doctors/${DOCTOR}/availability`)
        .query({ startDate: "2025-03-01", endDate: "2025-03-01" })
        .set(asPatient);

      expect(response.status).toBe(200);
      expect(response.body.data).toHaveLength(16);
      expect(response.body.data[0]).toEqual({
        start: "2025-03-01T09:00:00.000Z",
        end: "2025-03-01T09:30:00.000Z",
        fee: 500,
        doctorId: DOCTOR,
        clinicId: null,
      });
    });

    it("caps the availability range", async () => {
      const response = await request(app)
        .get(`/api/v1/doctors/${DOCTOR}/availability`)
        .query({ startDate: "2025-03-01", endDate: "2025-04-15" })
        .set(asPatient);

      expect(response.status).toBe(400);
      expect(response.body.errors[0].message).toBe("Date range cannot exceed 31 days");
    });

    it("returns the next free slots", async () => {
      const response = await request(app)
        .get(`/api/v1/doctors/${DOCTOR}/next-available`)
        .query({ count: 2 })
        .set(asPatient);

      expect(response.body.data.map((slot: { start: string }) => slot.start)).toEqual([
        "2025-03-01T09:00:00.000Z",
        "2025-03-01T09:30:00.000Z",
      ]);
    });

    it("shows statistics to the doctor only", async () => {
      const byPatient = await request(app).get(`/api/v1/doctors/${DOCTOR}/stats`).set(asPatient);
      const byDoctor = await request(app).get(`/api/v1/doctors/${DOCTOR}/stats`).set(asDoctor);

      expect(byPatient.status).toBe(403);
      expect(byDoctor.status).toBe(200);
      expect(byDoctor.body.data.total).toBe(0);
    });
  });

  it("answers unknown routes with 404", async () => {
    const response = await request(app).get("/api/v1/nothing-here");

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      success: false,
      message: "Route GET /api/v1/nothing-here not found",
      code: "ROUTE_NOT_FOUND",
    });
  });
});

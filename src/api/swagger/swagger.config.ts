import swaggerJsdoc from "swagger-jsdoc";
import { config } from "@/shared/config/environment";

const isoDateTime = { type: "string", format: "date-time" } as const;
const uuid = { type: "string", format: "uuid" } as const;

const swaggerDefinition = {
  openapi: "3.0.0",
  info: {
    title: config.app.name,
    version: "1.0.0",
    description: "Appointment booking and availability API for doctors and clinics",
    license: {
      name: "MIT",
      url: "https://opensource.org/licenses/MIT",
    },
  },
  servers: [
    {
      url: `http://localhost:${config.app.port}/api/${config.app.apiVersion}`,
      description: config.app.isDevelopment ? "Development server" : "Local server",
    },
  ],
  components: {
    securitySchemes: {
      bearerAuth: {
        type: "http",
        scheme: "bearer",
        bearerFormat: "JWT",
        description: "JWT issued by the identity service",
      },
    },
    schemas: {
      ApiResponse: {
        type: "object",
        properties: {
          success: {
            type: "boolean",
            description: "Indicates if the request was successful",
          },
          data: {
            type: "object",
            description: "Response data (if any)",
          },
          message: {
            type: "string",
            description: "Human-readable message",
          },
          code: {
            type: "string",
            description: "Machine-readable error code, e.g. TIME_SLOT_OCCUPIED",
          },
          errors: {
            type: "array",
            items: {
              $ref: "#/components/schemas/ValidationError",
            },
            description: "Validation errors (if any)",
          },
        },
        required: ["success"],
      },
      ValidationError: {
        type: "object",
        properties: {
          field: {
            type: "string",
            description: "Field that failed validation",
          },
          message: {
            type: "string",
            description: "Validation error message",
          },
          code: {
            type: "string",
            description: "Error code",
          },
        },
        required: ["field", "message"],
      },
      AvailabilitySlot: {
        type: "object",
        properties: {
          start: isoDateTime,
          end: isoDateTime,
          fee: { type: "number" },
          doctorId: uuid,
          clinicId: { ...uuid, nullable: true },
        },
        required: ["start", "end", "fee", "doctorId", "clinicId"],
      },
      Appointment: {
        type: "object",
        properties: {
          id: uuid,
          userId: uuid,
          doctorId: uuid,
          clinicId: { ...uuid, nullable: true },
          appointmentDate: { type: "string", format: "date" },
          startTime: isoDateTime,
          endTime: isoDateTime,
          type: { type: "string", enum: ["online", "offline"] },
          status: {
            type: "string",
            enum: ["pending", "confirmed", "in_progress", "completed", "cancelled", "no_show", "rescheduled"],
          },
          confirmationCode: { type: "string", example: "K7Q2ZD9M" },
          payment: {
            type: "object",
            properties: {
              orderId: { type: "string", nullable: true },
              paymentId: { type: "string", nullable: true },
              amount: { type: "number" },
              currency: { type: "string" },
              status: { type: "string", enum: ["pending", "paid", "failed", "refunded", "partially_refunded"] },
            },
          },
          isEmergency: { type: "boolean" },
          isFollowUp: { type: "boolean" },
          rescheduleCount: { type: "integer" },
          version: { type: "integer" },
        },
        required: ["id", "userId", "doctorId", "startTime", "endTime", "type", "status", "confirmationCode"],
      },
      BookAppointmentRequest: {
        type: "object",
        properties: {
          doctorId: uuid,
          userId: {
            ...uuid,
            description: "Patient identifier (ignored when the caller is a patient)",
          },
          clinicId: { ...uuid, nullable: true, description: "Required for in-person visits" },
          type: { type: "string", enum: ["online", "offline"] },
          preferredStartTime: { ...isoDateTime, example: "2025-03-01T10:00:00Z" },
          notes: { type: "string", maxLength: 500 },
        },
        required: ["doctorId", "type", "preferredStartTime"],
      },
    },
  },
  tags: [
    {
      name: "Appointments",
      description: "Booking, lifecycle and payment of appointments",
    },
    {
      name: "Doctors",
      description: "Doctor availability and booking statistics",
    },
  ],
};

const options = {
  definition: swaggerDefinition,
  apis: ["./src/domains/**/*.ts", "./src/api/**/*.ts"],
};

export const createSwaggerSpec = (): object => {
  return swaggerJsdoc(options);
};

import express from "express";
import request from "supertest";
import { sendAppError, sendError, sendSuccess } from "../utils/response";
import { EmptyRequestError } from "../utils/errors";

const appSending = (handler: express.RequestHandler) => {
  const app = express();
  app.get("/", handler);
  return app;
};

describe("response helpers", () => {
  it("wraps data in a success envelope", async () => {
    const res = await request(
      appSending((_req, res) => {
        sendSuccess(res, "done", { id: 1 }, 201);
      })
    ).get("/");

    expect(res.status).toBe(201);
    expect(res.body).toEqual({ success: true, message: "done", data: { id: 1 } });
  });

  it("includes error detail only when given", async () => {
    const res = await request(
      appSending((_req, res) => {
        sendError(res, "Invalid request", 400, "Unexpected token");
      })
    ).get("/");

    expect(res.body).toEqual({
      success: false,
      message: "Invalid request",
      error: "Unexpected token",
    });
  });

  it("uses an AppError's own status and message", async () => {
    const res = await request(
      appSending((_req, res) => {
        sendAppError(res, new EmptyRequestError());
      })
    ).get("/");

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      success: false,
      message: "Please type something about the workout you want.",
    });
  });

  it("hides anything else behind a 500", async () => {
    const res = await request(
      appSending((_req, res) => {
        sendAppError(res, new Error("database password leaked"));
      })
    ).get("/");

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ success: false, message: "Internal Server Error" });
  });
});

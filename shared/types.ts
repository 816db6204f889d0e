/**
 * JSON bodies exchanged between the dashboard page and the local server.
 */

export type OkResponse = { status: "ok" };

export type TogglePinResponse = OkResponse & { pinned: boolean };

export type ErrorResponse = { status: "error"; message: string };

export type OpenProjectResponse = OkResponse;

import { describe, expect, it } from "vitest";

import { AppError } from "./app-error";
import { describeAppError, userFacingMessage } from "./error-messages";

describe("userFacingMessage", () => {
  it("maps a known code", () => {
    expect(userFacingMessage("CAPTCHA_TIMED_OUT", "deadline passed")).toBe(
      "The CAPTCHA was not solved in time. No cookies were changed.",
    );
  });

  it("keeps the raw message for an unknown code", () => {
    expect(userFacingMessage("UNKNOWN_CODE", "detail")).toBe("detail");
  });
});

describe("describeAppError", () => {
  it("keeps the raw message and adds the user-facing one", () => {
    const error = new AppError("yt-dlp exited with code 1", "AUDIO_DOWNLOAD_FAILED", 502);

    expect(describeAppError(error)).toEqual({
      error: "yt-dlp exited with code 1",
      code: "AUDIO_DOWNLOAD_FAILED",
      message: "Downloading the video audio failed. Check that yt-dlp is installed and up to date.",
    });
  });
});

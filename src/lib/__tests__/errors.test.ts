import { describe, it, expect } from "vitest";
import {
  ChannelNotBoundError,
  LengthMismatchError,
  LineageError,
  PluginNotFoundError,
  StepExecutionError,
  UnknownOperationError,
  extractErrorMessage,
  isLineageError,
} from "../errors";

describe("error taxonomy", () => {
  it("names errors after their class and carries a code", () => {
    const error = new ChannelNotBoundError("signal", "Peaks_X");
    expect(error).toBeInstanceOf(LineageError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("ChannelNotBoundError");
    expect(error.code).toBe("channel_not_bound");
    expect(error.message).toBe(
      "No channel bound for role 'signal' (instance='Peaks_X')",
    );
    expect(error.details).toEqual({
      semanticRole: "signal",
      instanceName: "Peaks_X",
    });
  });

  it("formats operation and length errors", () => {
    expect(new UnknownOperationError("wavelet").message).toBe(
      "Unknown operation: wavelet",
    );
    expect(new LengthMismatchError([100, 50]).message).toBe(
      "Channel lengths differ: [100, 50]",
    );
    expect(new PluginNotFoundError("Annotator", "Nope").message).toBe(
      "Annotator not found: Nope",
    );
  });

  it("wraps a step failure with the step name", () => {
    const error = new StepExecutionError(
      "Peaks_X",
      "annotator",
      new Error("boom"),
    );
    expect(error.stepName).toBe("Peaks_X");
    expect(error.message).toBe("annotator step 'Peaks_X' failed: boom");
  });
});

describe("extractErrorMessage", () => {
  it("handles errors, strings and message-bearing objects", () => {
    expect(extractErrorMessage(new Error("bad"))).toBe("bad");
    expect(extractErrorMessage("plain")).toBe("plain");
    expect(extractErrorMessage({ message: "object" })).toBe("object");
    expect(extractErrorMessage(42)).toBe("An unexpected error occurred");
  });
});

describe("isLineageError", () => {
  it("recognises library errors only", () => {
    expect(isLineageError(new UnknownOperationError("x"))).toBe(true);
    expect(isLineageError(new Error("x"))).toBe(false);
  });
});

import { describe, it, expect } from "vitest";
import {
  ARTIFACTS_BEGIN_MARKER,
  ArtifactCountError,
  DATA_BEGIN_MARKER,
  DATA_END_MARKER,
  assemblePrompt,
  selectVariant,
  type ArtifactHandle,
} from "./promptAssembler";

const FULL = { template_id: "AM_FULL_REPORT", variant: "full", artifact_count: 10 } as const;
const BRIEF = { template_id: "AM_BRIEF_REPORT", variant: "brief", artifact_count: 0 } as const;

function graphs(count: number): ArtifactHandle[] {
  return Array.from({ length: count }, (_, i): ArtifactHandle => ({
    name: `graph_${i + 1}.png`,
    mediaType: "image/png",
    data: Buffer.from([i]),
  }));
}

describe("assemblePrompt", () => {
  it("orders instructions, data and graphs", () => {
    const artifacts = graphs(10);
    const request = assemblePrompt(FULL, "BOUND", "RAW DATA", artifacts);

    expect(request.templateId).toBe("AM_FULL_REPORT");
    expect(request.variant).toBe("full");
    expect(request.parts.slice(0, 5)).toEqual([
      { type: "text", text: "BOUND" },
      { type: "text", text: DATA_BEGIN_MARKER },
      { type: "text", text: "RAW DATA" },
      { type: "text", text: DATA_END_MARKER },
      { type: "text", text: ARTIFACTS_BEGIN_MARKER },
    ]);
    expect(request.parts).toHaveLength(15);
    expect(request.parts.slice(5)).toEqual(artifacts.map(artifact => ({ type: "artifact", artifact })));
  });

  it.each([0, 9, 11])("rejects %i artifacts for the full template", count => {
    expect(() => assemblePrompt(FULL, "BOUND", "RAW", graphs(count))).toThrow(ArtifactCountError);
  });

  it("reports expected and received counts", () => {
    try {
      assemblePrompt(FULL, "BOUND", "RAW", graphs(9));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ArtifactCountError);
      if (error instanceof ArtifactCountError) {
        expect(error.expected).toBe(10);
        expect(error.received).toBe(9);
        expect(error.message).toBe("Template AM_FULL_REPORT requires exactly 10 artifacts, received 9");
      }
    }
  });

  it("builds a text-only request for the brief template", () => {
    const request = assemblePrompt(BRIEF, "BOUND", "RAW");

    expect(request.parts).toHaveLength(4);
    expect(request.parts.every(part => part.type === "text")).toBe(true);
  });

  it("rejects artifacts for the brief template", () => {
    expect(() => assemblePrompt(BRIEF, "BOUND", "RAW", graphs(1))).toThrow(
      "Template AM_BRIEF_REPORT requires exactly 0 artifacts, received 1"
    );
  });
});

describe("selectVariant", () => {
  it("uses the full template only when graphs are attached", () => {
    expect(selectVariant("full", 10)).toBe("full");
    expect(selectVariant("full", 3)).toBe("full");
    expect(selectVariant("full", 0)).toBe("brief");
    expect(selectVariant("brief", 10)).toBe("brief");
  });
});

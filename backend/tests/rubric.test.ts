import { describe, expect, test } from "vitest";
import { getRubricConfig, parseRubricConfig } from "../src/eval/rubrics/types";
import { VOICE_AGENT_V1_RUBRIC } from "../src/eval/rubrics/voice-agent-v1";
import { RubricConfigurationError } from "../src/services/evaluation/errors";

describe("rubric config", () => {
  test("voice-agent-v1 is registered and valid", () => {
    const rubric = getRubricConfig("voice-agent-v1");
    expect(rubric?.passThreshold).toBe(75);
    expect(rubric?.criteria.response_correctness.weight).toBe(0.25);
  });

  test("unknown schema version returns null", () => {
    expect(getRubricConfig("voice-agent-v0")).toBeNull();
  });

  test("weights that do not sum to 1 are rejected", () => {
    const broken = {
      ...VOICE_AGENT_V1_RUBRIC,
      criteria: {
        ...VOICE_AGENT_V1_RUBRIC.criteria,
        conversation_flow: { ...VOICE_AGENT_V1_RUBRIC.criteria.conversation_flow, weight: 0.2 }
      }
    };
    expect(() => parseRubricConfig(broken)).toThrow(RubricConfigurationError);
    expect(() => parseRubricConfig(broken)).toThrow(/weights sum to 1\.1/);
  });

  test("unknown criterion is rejected", () => {
    const extra = {
      ...VOICE_AGENT_V1_RUBRIC,
      criteria: { ...VOICE_AGENT_V1_RUBRIC.criteria, response_time: { weight: 0.1, threshold: 2, description: "" } }
    };
    expect(() => parseRubricConfig(extra)).toThrow(RubricConfigurationError);
  });

  test("missing criterion is rejected", () => {
    const { safety_compliance: _dropped, ...criteria } = VOICE_AGENT_V1_RUBRIC.criteria;
    expect(() => parseRubricConfig({ ...VOICE_AGENT_V1_RUBRIC, criteria })).toThrow(/safety_compliance/);
  });
});

import { DecodeError, Result } from "./errors.js";
import { TopicRoute } from "./schema.js";

/**
 * Uplink topics have a fixed segment count. A layout names each segment:
 * `{gateway}` and `{channel}` capture, `*` accepts anything non-empty and any
 * other text must match literally. The default `*\/*\/{gateway}\/{channel}`
 * accepts `region/sub/gatewayA/1234`; Meshtastic firmware publishes
 * `msh/<region>/<area>/2/e/<channel>/<!gateway>`, which is
 * `msh/*\/*\/2/e/{channel}/{gateway}`.
 */
export const DEFAULT_TOPIC_LAYOUT = "*/*/{gateway}/{channel}";

type Segment = { type: "gateway" } | { type: "channel" } | { type: "any" } | { type: "literal"; value: string };

export type TopicLayout = {
  source: string;
  segments: Segment[];
};

export function compileTopicLayout(layout: string): TopicLayout {
  const parts = layout.split("/");
  const segments: Segment[] = parts.map((part) => {
    if (part === "{gateway}") return { type: "gateway" };
    if (part === "{channel}") return { type: "channel" };
    if (part === "*") return { type: "any" };
    if (!part || part.includes("+") || part.includes("#") || part.includes("{")) {
      throw new Error(`invalid topic layout segment "${part}" in "${layout}"`);
    }
    return { type: "literal", value: part };
  });
  const gateways = segments.filter((s) => s.type === "gateway").length;
  const channels = segments.filter((s) => s.type === "channel").length;
  if (gateways !== 1 || channels !== 1) {
    throw new Error(`topic layout "${layout}" needs exactly one {gateway} and one {channel}`);
  }
  return { source: layout, segments };
}

export function parseTopic(topic: string, layout: TopicLayout): Result<TopicRoute, DecodeError> {
  const parts = topic.split("/");
  if (parts.length !== layout.segments.length) {
    return {
      ok: false,
      error: new DecodeError(
        "topic",
        `topic "${topic}" has ${parts.length} segments, layout "${layout.source}" expects ${layout.segments.length}`,
      ),
    };
  }
  let gatewayNodeId = "";
  let channel = "";
  for (let i = 0; i < parts.length; i += 1) {
    const part = parts[i];
    const seg = layout.segments[i];
    if (!part) {
      return { ok: false, error: new DecodeError("topic", `topic "${topic}" has an empty segment at ${i}`) };
    }
    if (seg.type === "gateway") gatewayNodeId = part;
    else if (seg.type === "channel") channel = part;
    else if (seg.type === "literal" && seg.value !== part) {
      return {
        ok: false,
        error: new DecodeError("topic", `topic "${topic}" segment ${i} is "${part}", expected "${seg.value}"`),
      };
    }
  }
  return { ok: true, value: { gatewayNodeId, channel } };
}

import type { Tool } from "../types/tool";

export const echoTool: Tool = {
  execute: async (inputs) => ({
    exitStatus: { code: 0, kind: "code" },
    stderr: "",
    stdout: `Echoed: ${inputs.text ?? ""}`,
  }),
  predict: (inputs) => `read-only: prints "${inputs.text ?? ""}"`,
  spec: {
    description: "Echoes the given text back with a prefix.",
    effect: "read_only",
    inputHint: "Text to echo.",
    name: "echo",
    outputSchema: "the text prefixed with 'Echoed: '",
    requiredInputs: ["text"],
    tags: ["diagnostic"],
  },
};

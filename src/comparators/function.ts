/**
 * Serverless functions (`aws_lambda_function` ↔ `lambda_functions`).
 */

import { defineResourceKind } from "./kind.js";

type FunctionView = {
  runtime: string | undefined;
  memorySize: number | undefined;
  timeout: number | undefined;
};

export const functionKind = defineResourceKind<FunctionView>({
  kind: "function",
  resourceType: "aws_lambda_function",
  label: "Lambda function",
  collection: "lambda_functions",
  liveIdField: "FunctionName",
  declaredIdFields: ["function_name"],
  readDeclared: (attributes) => ({
    runtime: attributes.string("runtime"),
    memorySize: attributes.number("memory_size"),
    timeout: attributes.number("timeout"),
  }),
  readLive: (record) => ({
    runtime: record.string("Runtime"),
    memorySize: record.number("MemorySize"),
    timeout: record.number("Timeout"),
  }),
  projections: [
    { field: "runtime", impact: "Compatibility and performance implications" },
    { field: "memorySize", impact: "Performance and cost implications" },
    { field: "timeout", impact: "Function execution behavior" },
  ],
  liveName: (record) => record.string("FunctionName"),
  describeLive: (record) => ({
    runtime: record.string("Runtime") ?? null,
    memorySize: record.number("MemorySize") ?? null,
    lastModified: record.string("LastModified") ?? null,
  }),
});

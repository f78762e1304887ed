import { BedrockRuntimeClient } from "@aws-sdk/client-bedrock-runtime";

export function createBedrockRuntimeClient(region: string): BedrockRuntimeClient {
  return new BedrockRuntimeClient({ region });
}

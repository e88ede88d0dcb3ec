/**
 * Credential a running FlexServ instance expects from its callers: the
 * configured secret followed by the model id with "/" replaced by "_".
 * With no secret, "openai-community/gpt2" yields "openai-community_gpt2".
 */
export function flexservToken(secret: string, modelId: string): string {
  return `${secret}${modelId.replaceAll("/", "_")}`;
}

/** Instances accept the token in either header; proxies sometimes strip the custom one. */
export function flexservAuthHeaders(token: string): Record<string, string> {
  return {
    Authorization: `Bearer ${token}`,
    "X-FlexServ-Secret": token,
  };
}

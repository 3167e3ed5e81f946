/**
 * JSON extraction for model responses.
 *
 * Models sometimes wrap JSON in a code fence or add a sentence around it.
 * This finds the JSON object in either form.
 */

export function extractJsonFromResponse(response: string): string {
  const codeBlockMatch = response.match(/```(?:json)?\s*([\s\S]*?)```/);
  const jsonString = (codeBlockMatch?.[1] ?? response).trim();

  if (jsonString.startsWith('{')) {
    return jsonString;
  }

  const startIdx = jsonString.indexOf('{');
  const endIdx = jsonString.lastIndexOf('}');
  if (startIdx !== -1 && endIdx > startIdx) {
    return jsonString.substring(startIdx, endIdx + 1);
  }
  return jsonString;
}

/**
 * Parses the JSON object in a response.
 *
 * @throws Error when no valid JSON can be found
 */
export function parseJsonResponse(response: string): unknown {
  const json = extractJsonFromResponse(response);
  try {
    return JSON.parse(json);
  } catch (error) {
    throw new Error(`Response is not valid JSON: ${response.substring(0, 100)}`, { cause: error });
  }
}

/**
 * MCP tool handler for help.
 */
import { jsonResponse, type ToolResponse } from '../utils.js';

const TOOLS = [
  { name: 'iching_cast', summary: 'Cast a new reading with coins', example: '{"question": "Should I move?"}' },
  { name: 'iching_cast', summary: 'Reading from six line values', example: '{"lines": [7, 8, 9, 6, 7, 8]}' },
  { name: 'iching_interpret', summary: 'Reading for a hexagram number or glyph', example: '{"input": "1"}' },
  { name: 'iching_interpret', summary: 'Reading for a transition', example: '{"input": "32→34"}' },
];

export function handleHelp(): ToolResponse {
  return jsonResponse({
    message: 'I Ching MCP Tools',
    lineValues: {
      '6': 'old yin (changing)',
      '7': 'young yang',
      '8': 'young yin',
      '9': 'old yang (changing)',
    },
    tools: TOOLS,
  });
}

/**
 * MCP tool definitions.
 */

const questionProperty = {
  type: 'string',
  description: 'Question to record with the reading (optional)',
};

export const toolDefinitions = [
  {
    name: 'iching_help',
    description: 'List the I Ching tools with example arguments',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'iching_cast',
    description: 'Cast a hexagram with three coins per line, or build one from six explicit line values (6, 7, 8 or 9, bottom line first)',
    inputSchema: {
      type: 'object',
      properties: {
        lines: {
          oneOf: [
            { type: 'array', items: { type: 'integer', enum: [6, 7, 8, 9] }, minItems: 6, maxItems: 6 },
            { type: 'string' },
          ],
          description: 'Six line values, e.g. [7, 8, 9, 6, 7, 8] or "7,8,9,6,7,8" (omit to cast coins)',
        },
        question: questionProperty,
      },
    },
  },
  {
    name: 'iching_interpret',
    description: 'Interpret a hexagram number (1-64), a hexagram glyph, six line values or a transition such as "32→34"',
    inputSchema: {
      type: 'object',
      properties: {
        input: {
          type: 'string',
          description: 'e.g. "1", "䷀", "7,8,9,6,7,8", "32→34" or "32->34"',
        },
        question: questionProperty,
      },
      required: ['input'],
    },
  },
];

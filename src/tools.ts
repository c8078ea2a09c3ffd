/**
 * Tool definitions for the Senso MCP Server
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';

export const TOOLS: Tool[] = [
  {
    name: 'add_content',
    description: 'Add raw text content to the Senso knowledge base. Returns the identifier the content was stored under.',
    inputSchema: {
      type: 'object',
      properties: {
        title: {
          type: 'string',
          description: 'Title of the content'
        },
        summary: {
          type: 'string',
          description: 'Short summary of the content'
        },
        text: {
          type: 'string',
          description: 'The raw text content to add'
        }
      },
      required: ['title', 'text']
    }
  },
  {
    name: 'search_content',
    description: 'Search the Senso knowledge base. Returns a generated answer and the matching entries with their identifiers, titles and text snippets.',
    inputSchema: {
      type: 'object',
      properties: {
        query: {
          type: 'string',
          description: 'The search query (e.g., "onboarding checklist", "refund policy")'
        },
        limit: {
          type: 'number',
          description: 'Maximum number of results to return (max: 50). Omit to use the service default.',
          minimum: 1,
          maximum: 50
        }
      },
      required: ['query']
    }
  },
  {
    name: 'generate_content',
    description: 'Generate new content on a topic from what is already in the knowledge base. Optionally saves the result and reports its identifier.',
    inputSchema: {
      type: 'object',
      properties: {
        topic: {
          type: 'string',
          description: 'Topic or type of content to generate (e.g., "product FAQ")'
        },
        instructions: {
          type: 'string',
          description: 'Instructions for the generation. Defaults to the topic.'
        },
        save: {
          type: 'boolean',
          description: 'Whether to store the generated content in the knowledge base',
          default: false
        },
        max_results: {
          type: 'number',
          description: 'Maximum number of source entries to draw from (max: 50)',
          minimum: 1,
          maximum: 50
        }
      },
      required: ['topic']
    }
  },
  {
    name: 'create_prompt',
    description: 'Create a reusable prompt for content generation. Variables use the {{variable}} format.',
    inputSchema: {
      type: 'object',
      properties: {
        name: {
          type: 'string',
          description: 'Unique name of the prompt'
        },
        text: {
          type: 'string',
          description: 'Prompt text with variables in {{variable}} format'
        }
      },
      required: ['name', 'text']
    }
  },
  {
    name: 'list_prompts',
    description: 'List the prompts defined in the organization',
    inputSchema: {
      type: 'object',
      properties: {
        limit: {
          type: 'number',
          description: 'Maximum number of prompts to return (default: 10, values above 100 are capped at 100)',
          minimum: 1,
          default: 10
        },
        offset: {
          type: 'number',
          description: 'Number of prompts to skip for pagination',
          minimum: 0,
          default: 0
        }
      }
    }
  },
  {
    name: 'update_prompt',
    description: 'Replace the name and text of an existing prompt',
    inputSchema: {
      type: 'object',
      properties: {
        prompt_id: {
          type: 'string',
          description: 'Identifier of the prompt to update'
        },
        name: {
          type: 'string',
          description: 'New name of the prompt'
        },
        text: {
          type: 'string',
          description: 'New prompt text'
        }
      },
      required: ['prompt_id', 'name', 'text']
    }
  },
  {
    name: 'create_template',
    description: 'Create an output template used to format generated content',
    inputSchema: {
      type: 'object',
      properties: {
        name: {
          type: 'string',
          description: 'Unique name of the template'
        },
        text: {
          type: 'string',
          description: 'Template text with variables in {{variable}} format'
        },
        output_type: {
          type: 'string',
          enum: ['text', 'json'],
          description: 'Output format of the template',
          default: 'text'
        }
      },
      required: ['name', 'text']
    }
  },
  {
    name: 'list_templates',
    description: 'List the output templates defined in the organization',
    inputSchema: {
      type: 'object',
      properties: {
        limit: {
          type: 'number',
          description: 'Maximum number of templates to return (default: 10, values above 100 are capped at 100)',
          minimum: 1,
          default: 10
        },
        offset: {
          type: 'number',
          description: 'Number of templates to skip for pagination',
          minimum: 0,
          default: 0
        }
      }
    }
  },
  {
    name: 'update_template',
    description: 'Replace the name, text and output type of an existing template',
    inputSchema: {
      type: 'object',
      properties: {
        template_id: {
          type: 'string',
          description: 'Identifier of the template to update'
        },
        name: {
          type: 'string',
          description: 'New name of the template'
        },
        text: {
          type: 'string',
          description: 'New template text'
        },
        output_type: {
          type: 'string',
          enum: ['text', 'json'],
          description: 'Output format of the template',
          default: 'text'
        }
      },
      required: ['template_id', 'name', 'text']
    }
  },
  {
    name: 'generate_with_prompt',
    description: 'Generate content with a saved prompt, optionally formatted by a saved template',
    inputSchema: {
      type: 'object',
      properties: {
        prompt_id: {
          type: 'string',
          description: 'Identifier of the prompt to use'
        },
        content_type: {
          type: 'string',
          description: 'What to look for in the knowledge base as source material'
        },
        template_id: {
          type: 'string',
          description: 'Identifier of a template to format the output with'
        },
        save: {
          type: 'boolean',
          description: 'Whether to store the generated content',
          default: false
        },
        max_results: {
          type: 'number',
          description: 'Maximum number of source entries to draw from (default: 25, max: 100)',
          minimum: 1,
          maximum: 100,
          default: 25
        }
      },
      required: ['prompt_id', 'content_type']
    }
  }
];

export const TOOL_NAMES: readonly string[] = TOOLS.map((tool) => tool.name);

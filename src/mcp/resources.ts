import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import * as z from 'zod/v4';
import { serializeCategory, serializeUser } from '../api/serialize.js';
import { BUDGET_WARNING_PERCENT } from '../analytics/service.js';
import { type Services } from '../services.js';

type PromptMessages = { messages: Array<{ role: 'user', content: { type: 'text', text: string } }> };

const userPrompt = (lines: string[]): PromptMessages => ({
  messages: [
    {
      role: 'user',
      content: { type: 'text', text: lines.join('\n') }
    }
  ]
});

/**
 * Read-only snapshots for discovery, plus prompt templates that point the
 * model at the analytics tools.
 */
export const registerResourcesAndPrompts = (server: McpServer, { finance }: Services): void => {
  server.registerResource(
    'categories',
    'finance://categories',
    { mimeType: 'application/json', description: 'All categories with their ids' },
    async () => ({
      contents: [
        {
          uri: 'finance://categories',
          mimeType: 'application/json',
          text: JSON.stringify(finance.getCategories().map(serializeCategory), null, 2)
        }
      ]
    })
  );

  server.registerResource(
    'users',
    'finance://users',
    { mimeType: 'application/json', description: 'All users with their ids' },
    async () => ({
      contents: [
        {
          uri: 'finance://users',
          mimeType: 'application/json',
          text: JSON.stringify(finance.getUsers().map(serializeUser), null, 2)
        }
      ]
    })
  );

  server.registerPrompt(
    'budget-advisor',
    {
      description: 'Review a user\'s budgets and recent spending and suggest next steps.',
      argsSchema: {
        userId: z.string().describe('User id to advise')
      }
    },
    async ({ userId }) => userPrompt([
      `You are a budget advisor for user ${userId}.`,
      'Use these tools as needed:',
      '- get-budget-status for spend against each budget (status ok, warning or over).',
      `- Budgets at or above ${BUDGET_WARNING_PERCENT}% of their limit are flagged as warning.`,
      '- get-spending-by-category with period "monthly" for the largest spending areas.',
      '- get-financial-summary for income, expense and net balance.',
      'Give concise advice and concrete next steps.'
    ])
  );

  server.registerPrompt(
    'spending-summary',
    {
      description: 'Summarize a user\'s income and spending over recent months.',
      argsSchema: {
        userId: z.string().describe('User id to summarize'),
        months: z.string().optional().describe('Number of months to cover (default 6)')
      }
    },
    async ({ userId, months }) => userPrompt([
      `Provide a spending summary for user ${userId} over the last ${months ?? '6'} months.`,
      'Pull data using:',
      `- Tool get-monthly-trend with months=${months ?? '6'} (income and expense per month).`,
      '- Tool get-spending-by-category (top categories in the last 30 days).',
      'Present totals clearly and keep the response brief.'
    ])
  );
};

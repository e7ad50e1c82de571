import { z } from "zod"
import type { Scope } from "./config.js"
import type { BackendTool } from "./types.js"

const READ: readonly Scope[] = ['gmail.readonly', 'gmail.modify']
const READ_LABELS: readonly Scope[] = ['gmail.readonly', 'gmail.labels', 'gmail.modify']
const WRITE_LABELS: readonly Scope[] = ['gmail.labels', 'gmail.modify']
const READ_DRAFTS: readonly Scope[] = ['gmail.readonly', 'gmail.compose', 'gmail.modify']
const WRITE_DRAFTS: readonly Scope[] = ['gmail.compose', 'gmail.modify']

const PAGING = { query: 'q', max_results: 'max', page_token: 'pageToken' } as const

const id = (what: string) => z.string({ required_error: 'is required', invalid_type_error: 'must be a string' })
  .trim()
  .min(1, 'must not be empty')
  .describe(`The Gmail ${what} ID`)

const maxResults = (fallback: number) => z.number({ invalid_type_error: 'must be a number' })
  .int('must be an integer')
  .min(1, 'must be at least 1')
  .max(100, 'must be at most 100')
  .default(fallback)
  .describe(`Maximum number of results to return (1-100, default: ${fallback})`)

const pageToken = z.string().optional().describe("Pagination token from a previous response's nextPageToken")

const flag = (description: string) => z.boolean({ invalid_type_error: 'must be a boolean' }).default(false).describe(description)

export const gmailTools: readonly BackendTool[] = [
  // --- Profile ---
  {
    kind: 'backend',
    name: 'gmail_get_profile',
    description: 'Get Gmail profile information (email address, message and thread counts)',
    params: z.object({}),
    scopes: READ,
    readOnly: true,
    method: 'GET',
    path: '/mcpGmailGetProfile',
    query: {},
    body: {}
  },

  // --- Messages ---
  {
    kind: 'backend',
    name: 'gmail_list_messages',
    description: 'List emails, optionally filtered with a Gmail search query',
    params: z.object({
      query: z.string().default('in:inbox').describe('Gmail search query (e.g. "from:boss@company.com is:unread")'),
      max_results: maxResults(10),
      page_token: pageToken
    }),
    scopes: READ,
    readOnly: true,
    method: 'GET',
    path: '/mcpGmailListMessages',
    query: PAGING,
    body: {}
  },
  {
    kind: 'backend',
    name: 'gmail_get_message',
    description: 'Get the full content of a specific email by ID',
    params: z.object({
      message_id: id('message'),
      include_html: flag('Whether to include the HTML body, excluded by default because it can be excessively large')
    }),
    scopes: READ,
    readOnly: true,
    method: 'GET',
    path: '/mcpGmailGetMessage/{message_id}',
    query: { include_html: 'includeHtml' },
    body: {}
  },
  {
    kind: 'backend',
    name: 'gmail_search',
    description: 'Search emails using Gmail query syntax (from:, to:, subject:, is:unread, has:attachment, after:, before:, ...)',
    params: z.object({
      query: z.string({ required_error: 'is required', invalid_type_error: 'must be a string' }).min(1, 'must not be empty').describe('Gmail search query, same syntax as the Gmail search box'),
      max_results: maxResults(20),
      page_token: pageToken
    }),
    scopes: READ,
    readOnly: true,
    method: 'GET',
    path: '/mcpGmailSearch',
    query: PAGING,
    body: {}
  },

  // --- Threads ---
  {
    kind: 'backend',
    name: 'gmail_list_threads',
    description: 'List email threads (conversations)',
    params: z.object({
      query: z.string().default('in:inbox').describe('Gmail search query to filter threads'),
      max_results: maxResults(10),
      page_token: pageToken
    }),
    scopes: READ,
    readOnly: true,
    method: 'GET',
    path: '/mcpGmailListThreads',
    query: PAGING,
    body: {}
  },
  {
    kind: 'backend',
    name: 'gmail_get_thread',
    description: 'Get a full email thread with all of its messages in chronological order',
    params: z.object({
      thread_id: id('thread'),
      include_html: flag('Whether to include HTML bodies, excluded by default because they can be excessively large')
    }),
    scopes: READ,
    readOnly: true,
    method: 'GET',
    path: '/mcpGmailGetThread/{thread_id}',
    query: { include_html: 'includeHtml' },
    body: {}
  },

  // --- Labels ---
  {
    kind: 'backend',
    name: 'gmail_list_labels',
    description: 'List all Gmail labels, both system (INBOX, SENT, SPAM, ...) and user-created',
    params: z.object({
      include_stats: flag('Whether to include message and thread counts for each label')
    }),
    scopes: READ_LABELS,
    readOnly: true,
    method: 'GET',
    path: '/mcpGmailListLabels',
    query: { include_stats: 'includeStats' },
    body: {}
  },
  {
    kind: 'backend',
    name: 'gmail_get_label',
    description: 'Get a specific label by ID',
    params: z.object({
      label_id: id('label')
    }),
    scopes: READ_LABELS,
    readOnly: true,
    method: 'GET',
    path: '/mcpGmailGetLabel/{label_id}',
    query: {},
    body: {}
  },
  {
    kind: 'backend',
    name: 'gmail_create_label',
    description: 'Create a new user label',
    params: z.object({
      name: z.string({ required_error: 'is required', invalid_type_error: 'must be a string' }).trim().min(1, 'must not be empty').describe('The display name of the label'),
      label_list_visibility: z.enum(['labelShow', 'labelShowIfUnread', 'labelHide']).optional().describe('Visibility of the label in the label list'),
      message_list_visibility: z.enum(['show', 'hide']).optional().describe('Visibility of messages with this label in the message list')
    }),
    scopes: WRITE_LABELS,
    readOnly: false,
    method: 'POST',
    path: '/mcpGmailCreateLabel',
    query: {},
    body: { name: 'name', label_list_visibility: 'labelListVisibility', message_list_visibility: 'messageListVisibility' }
  },
  {
    kind: 'backend',
    name: 'gmail_delete_label',
    description: 'Permanently delete a user label and remove it from any messages and threads',
    params: z.object({
      label_id: id('label')
    }),
    scopes: WRITE_LABELS,
    readOnly: false,
    destructive: true,
    method: 'DELETE',
    path: '/mcpGmailDeleteLabel/{label_id}',
    query: {},
    body: {}
  },

  // --- Drafts ---
  {
    kind: 'backend',
    name: 'gmail_list_drafts',
    description: "List drafts in the user's mailbox",
    params: z.object({
      query: z.string().optional().describe('Only return drafts matching this Gmail search query'),
      max_results: maxResults(10),
      page_token: pageToken
    }),
    scopes: READ_DRAFTS,
    readOnly: true,
    method: 'GET',
    path: '/mcpGmailListDrafts',
    query: PAGING,
    body: {}
  },
  {
    kind: 'backend',
    name: 'gmail_get_draft',
    description: 'Get a specific draft by ID',
    params: z.object({
      draft_id: id('draft')
    }),
    scopes: READ_DRAFTS,
    readOnly: true,
    method: 'GET',
    path: '/mcpGmailGetDraft/{draft_id}',
    query: {},
    body: {}
  },
  {
    kind: 'backend',
    name: 'gmail_create_draft',
    description: 'Create a draft email, optionally as a reply within an existing thread',
    params: z.object({
      to: z.string().optional().describe('Recipient email address(es), comma-separated'),
      cc: z.string().optional().describe('CC recipient email address(es), comma-separated'),
      bcc: z.string().optional().describe('BCC recipient email address(es), comma-separated'),
      subject: z.string().optional().describe('The subject of the email'),
      body: z.string().optional().describe('The plain text body of the email'),
      thread_id: z.string().trim().min(1, 'must not be empty').optional().describe('The thread ID to associate this draft with')
    }),
    scopes: WRITE_DRAFTS,
    readOnly: false,
    method: 'POST',
    path: '/mcpGmailCreateDraft',
    query: {},
    body: { to: 'to', cc: 'cc', bcc: 'bcc', subject: 'subject', body: 'body', thread_id: 'threadId' }
  },
  {
    kind: 'backend',
    name: 'gmail_send_draft',
    description: 'Send an existing draft to its recipients',
    params: z.object({
      draft_id: id('draft')
    }),
    scopes: WRITE_DRAFTS,
    readOnly: false,
    method: 'POST',
    path: '/mcpGmailSendDraft/{draft_id}',
    query: {},
    body: {}
  },
  {
    kind: 'backend',
    name: 'gmail_delete_draft',
    description: 'Permanently delete a draft',
    params: z.object({
      draft_id: id('draft')
    }),
    scopes: WRITE_DRAFTS,
    readOnly: false,
    destructive: true,
    method: 'DELETE',
    path: '/mcpGmailDeleteDraft/{draft_id}',
    query: {},
    body: {}
  },

  // --- Attachments ---
  {
    kind: 'backend',
    name: 'gmail_get_attachment',
    description: 'Get an attachment of a message; use the attachment ID from gmail_get_message. Data is base64url encoded',
    params: z.object({
      message_id: id('message'),
      attachment_id: id('attachment')
    }),
    scopes: READ,
    readOnly: true,
    method: 'GET',
    path: '/mcpGmailGetAttachment/{message_id}/{attachment_id}',
    query: {},
    body: {}
  }
]

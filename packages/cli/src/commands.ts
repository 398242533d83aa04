import { ArgumentError, DEFAULT_LIMIT, DEFAULT_ORDER } from "seobridge";

export type ToolArgs = Record<string, string | number>;

/** How one line of user input is routed */
export type InputLine =
  | { kind: "empty" }
  | { kind: "quit" }
  | { kind: "resource"; uri: string }
  | { kind: "command"; command: string; args: string[] }
  | { kind: "query"; text: string };

export type CommandAction =
  | { type: "help"; text: string }
  | { type: "usage"; text: string }
  | { type: "error"; message: string }
  | { type: "unknown"; message: string }
  | { type: "list_prompts" }
  | { type: "prompt"; name: string; args: Record<string, string> }
  | { type: "tool"; tool: string; args: ToolArgs };

export function classifyInput(line: string): InputLine {
  const text = line.trim();
  if (!text) return { kind: "empty" };
  if (text.toLowerCase() === "quit") return { kind: "quit" };

  if (text.startsWith("@")) {
    const topic = text.slice(1);
    return { kind: "resource", uri: topic === "folders" ? "papers://folders" : `papers://${topic}` };
  }

  if (text.startsWith("/")) {
    const [command, ...args] = text.split(/\s+/);
    return { kind: "command", command: command.toLowerCase(), args };
  }

  return { kind: "query", text };
}

export const WELCOME_TEXT = `MCP Chatbot Started!
Type your queries or 'quit' to exit.
Use @folders to see available topics
Use @<topic> to search papers in that topic
Use /prompts to list available prompts
Use /prompt <name> <arg1=value1> to execute a prompt
Use /topvisor to see Topvisor commands
Use /ahrefs to see Ahrefs commands
Use /help to see everything else`;

export const TOPVISOR_HELP = `Topvisor commands:
/setup                                        - Check Topvisor API setup
/projects                                     - List all projects
/keywords <project_id> [folder_id] [group_id] - Project keywords
/positions <project_id> [date_from] [date_to] - Position history (last 7 days by default)
/summary <project_id> [date_from] [date_to]   - Position summary
/competitors <project_id>                     - Project competitors
/regions <project_id>                         - Search regions
/folders <project_id>                         - Keyword folders
/groups <project_id> [folder_id]              - Keyword groups
/balance                                      - Account balance

Examples:
/keywords 12345 678                    - Keywords from folder 678
/positions 12345 2024-01-01 2024-01-31 - Positions for January 2024

Plain questions work too, e.g. "How much money is in the balance?"`;

export const AHREFS_HELP = `Ahrefs commands:
/ahrefs_setup                               - Check Ahrefs API setup
/refdomains <domain> [limit] [order_by]     - Referring domains
/backlinks <domain> [limit] [order_by]      - Backlinks
/organic <domain> [limit] [order_by] [date] - Organic keywords

Examples:
/refdomains example.com 50
/backlinks example.com 200 url_rating_source:desc
/organic example.com 100 best_position:asc 2024-01-15

Sorting:
refdomains: domain_rating:desc, first_seen:asc, last_seen:desc
backlinks:  domain_rating_source:desc, url_rating_source:desc
organic:    best_position:asc, volume:desc, keyword_difficulty:asc`;

export const GENERAL_HELP = `${WELCOME_TEXT}

${TOPVISOR_HELP}

${AHREFS_HELP}`;

const PROJECT_ID_ERROR = "Error: project_id must be a number";

function requireProjectId(value: string): number {
  if (!/^\d+$/.test(value)) throw new ArgumentError(PROJECT_ID_ERROR);
  return Number.parseInt(value, 10);
}

/** Digits only, otherwise treated as absent */
function optionalNumber(value: string | undefined): number | undefined {
  return value !== undefined && /^\d+$/.test(value) ? Number.parseInt(value, 10) : undefined;
}

interface CommandSpec {
  /** Positional arguments that must be present */
  required: number;
  usage?: string;
  build(args: string[]): CommandAction;
}

function tool(name: string, args: ToolArgs = {}): CommandAction {
  return { type: "tool", tool: name, args };
}

function withOptional(args: ToolArgs, extra: Record<string, string | number | undefined>): ToolArgs {
  for (const [key, value] of Object.entries(extra)) {
    if (value !== undefined) args[key] = value;
  }
  return args;
}

function ahrefsArgs(args: string[], defaultOrder: string): ToolArgs {
  return {
    target: args[0],
    limit: optionalNumber(args[1]) ?? DEFAULT_LIMIT,
    order_by: args[2] ?? defaultOrder,
  };
}

const COMMANDS: Record<string, CommandSpec> = {
  "/help": { required: 0, build: () => ({ type: "help", text: GENERAL_HELP }) },
  "/topvisor": { required: 0, build: () => ({ type: "help", text: TOPVISOR_HELP }) },
  "/ahrefs": { required: 0, build: () => ({ type: "help", text: AHREFS_HELP }) },
  "/prompts": { required: 0, build: () => ({ type: "list_prompts" }) },
  "/prompt": {
    required: 1,
    usage: "Usage: /prompt <name> <arg1=value1> <arg2=value2>",
    build: ([name, ...rest]) => {
      const args: Record<string, string> = {};
      for (const pair of rest) {
        const eq = pair.indexOf("=");
        if (eq > 0) args[pair.slice(0, eq)] = pair.slice(eq + 1);
      }
      return { type: "prompt", name, args };
    },
  },
  "/setup": { required: 0, build: () => tool("check_topvisor_setup") },
  "/ahrefs_setup": { required: 0, build: () => tool("check_ahrefs_setup") },
  "/projects": { required: 0, build: () => tool("get_topvisor_projects") },
  "/balance": { required: 0, build: () => tool("get_topvisor_balance") },
  "/keywords": {
    required: 1,
    usage: "Usage: /keywords <project_id> [folder_id] [group_id]",
    build: ([projectId, folderId, groupId]) =>
      tool(
        "get_topvisor_keywords",
        withOptional(
          { project_id: requireProjectId(projectId) },
          { folder_id: optionalNumber(folderId), group_id: optionalNumber(groupId) },
        ),
      ),
  },
  "/positions": {
    required: 1,
    usage: "Usage: /positions <project_id> [date_from] [date_to]",
    build: ([projectId, dateFrom, dateTo]) =>
      tool(
        "get_topvisor_positions_history",
        withOptional({ project_id: requireProjectId(projectId) }, { date1: dateFrom, date2: dateTo }),
      ),
  },
  "/summary": {
    required: 1,
    usage: "Usage: /summary <project_id> [date_from] [date_to]",
    build: ([projectId, dateFrom, dateTo]) =>
      tool(
        "get_topvisor_positions_summary",
        withOptional({ project_id: requireProjectId(projectId) }, { date1: dateFrom, date2: dateTo }),
      ),
  },
  "/competitors": {
    required: 1,
    usage: "Usage: /competitors <project_id>",
    build: ([projectId]) => tool("get_topvisor_competitors", { project_id: requireProjectId(projectId) }),
  },
  "/regions": {
    required: 1,
    usage: "Usage: /regions <project_id>",
    build: ([projectId]) => tool("get_topvisor_regions", { project_id: requireProjectId(projectId) }),
  },
  "/folders": {
    required: 1,
    usage: "Usage: /folders <project_id>",
    build: ([projectId]) => tool("get_topvisor_keyword_folders", { project_id: requireProjectId(projectId) }),
  },
  "/groups": {
    required: 1,
    usage: "Usage: /groups <project_id> [folder_id]",
    build: ([projectId, folderId]) =>
      tool(
        "get_topvisor_keyword_groups",
        withOptional({ project_id: requireProjectId(projectId) }, { folder_id: optionalNumber(folderId) }),
      ),
  },
  "/refdomains": {
    required: 1,
    usage: "Usage: /refdomains <domain> [limit] [order_by]",
    build: (args) => tool("get_ahrefs_refdomains", ahrefsArgs(args, DEFAULT_ORDER.refdomains)),
  },
  "/backlinks": {
    required: 1,
    usage: "Usage: /backlinks <domain> [limit] [order_by]",
    build: (args) => tool("get_ahrefs_backlinks", ahrefsArgs(args, DEFAULT_ORDER.backlinks)),
  },
  "/organic": {
    required: 1,
    usage: "Usage: /organic <domain> [limit] [order_by] [date]",
    build: (args) =>
      tool(
        "get_ahrefs_organic_keywords",
        withOptional(ahrefsArgs(args, DEFAULT_ORDER.organicKeywords), { date: args[3] }),
      ),
  },
};

/** Turn a slash command into an action. Never throws on bad input. */
export function resolveCommand(command: string, args: string[]): CommandAction {
  const spec = COMMANDS[command];
  if (!spec) return { type: "unknown", message: `Unknown command: ${command}` };
  if (args.length < spec.required) {
    return { type: "usage", text: spec.usage ?? `Usage: ${command}` };
  }
  try {
    return spec.build(args);
  } catch (err) {
    if (err instanceof ArgumentError) return { type: "error", message: err.message };
    throw err;
  }
}

export type SubmitArgs = {
  projectId?: string;
  instruction?: string;
  checks: string[];
  evaluationUrl?: string;
  retry: boolean;
  wait: boolean;
};

const USAGE =
  "Usage: npm run -w @pagesmith/agents submit -- --instruction=<text> [--project=<id>] [--check=<text>]... [--evaluation-url=<url>] [--retry] [--no-wait]";

function readFlag(arg: string, name: string) {
  return arg.startsWith(`--${name}=`) ? arg.slice(`--${name}=`.length) : undefined;
}

export function parseSubmitArgs(argv: string[]): SubmitArgs {
  const args: SubmitArgs = { checks: [], retry: false, wait: true };

  for (const arg of argv) {
    const project = readFlag(arg, "project");
    const instruction = readFlag(arg, "instruction");
    const check = readFlag(arg, "check");
    const evaluationUrl = readFlag(arg, "evaluation-url");

    if (project !== undefined) args.projectId = project;
    else if (instruction !== undefined) args.instruction = instruction;
    else if (check !== undefined) args.checks.push(check);
    else if (evaluationUrl !== undefined) args.evaluationUrl = evaluationUrl;
    else if (arg === "--retry") args.retry = true;
    else if (arg === "--no-wait") args.wait = false;
    else throw new Error(`Unknown argument: ${arg}\n${USAGE}`);
  }

  if (args.retry ? !args.projectId : !args.instruction) {
    throw new Error(USAGE);
  }
  return args;
}

export const BUTTONS = {
  scan: "🔍 Scan wallet",
  analyze: "🧪 Analyze contract",
  chains: "🌐 Chains",
  help: "❓ How it works"
} as const;

export const TEXTS = {
  start: (chainCount: number) =>
    "Hi! I check which contracts can spend your tokens.\n\n" +
    `Send a wallet address to scan its token approvals on up to ${chainCount} EVM networks, ` +
    "or a contract address to run a bytecode security analysis.\n\n" +
    "Read-only: no wallet connection, no signatures.",
  help:
    "How it works:\n\n" +
    "- you send a public 0x… address\n" +
    "- we collect its ERC-20 Approval events on every supported chain\n" +
    "- each active approval is scored by spender reputation and allowance size\n" +
    "- you get a risk score, the approvals to revoke first and CSV/HTML exports\n\n" +
    "Commands:\n" +
    "/scan <wallet> [chain,chain] - scan approvals\n" +
    "/analyze <contract> [chain] - analyze a contract\n" +
    "/batch <contract[:chain]> ... - analyze up to 10 contracts\n" +
    "/history <wallet> - recent scans of a wallet\n" +
    "/chains - supported networks\n" +
    "/health - service status",
  askWallet: "Send the wallet address (0x…). Optionally add chains: 0x… ethereum,base",
  askContract: "Send the contract address (0x…) and optionally a chain: 0x… polygon",
  invalidWallet: "That does not look like an EVM address. Expected 0x followed by 40 hex characters.",
  zeroWallet: "The zero address has no owner, nothing to scan.",
  scanning: "Scanning approvals… this can take up to half a minute.",
  analyzing: "Analyzing contract bytecode…",
  reportExpired: "This report is no longer available. Run the scan again.",
  noCritical: "No critical approvals in this report.",
  historyDisabled: "Scan history needs a database; it is not configured on this bot.",
  noHistory: "No saved scans for this wallet yet."
} as const;

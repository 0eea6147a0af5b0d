import { describe, expect, it } from "vitest";
import { CSV_HEADER, csvEscape, generateCsv } from "../../src/reports/csv.js";
import { DAI, PINK_DRAINER, UNISWAP_V3_ROUTER_2, WALLET, makeApproval, makeResult } from "../helpers.js";

describe("csvEscape", () => {
  it("quotes only when needed", () => {
    expect(csvEscape("plain")).toBe("plain");
    expect(csvEscape("a,b")).toBe('"a,b"');
    expect(csvEscape('say "hi"')).toBe('"say ""hi"""');
    expect(csvEscape("two\nlines")).toBe('"two\nlines"');
  });
});

describe("generateCsv", () => {
  it("writes the header for an empty scan", () => {
    expect(generateCsv(makeResult())).toBe(CSV_HEADER.join(",") + "\n");
  });

  it("writes one row per approval in scan order", () => {
    const csv = generateCsv(
      makeResult({
        approvals: [
          makeApproval(),
          makeApproval({
            spenderAddress: PINK_DRAINER,
            spenderName: 'Evil, "Inc"',
            spenderTier: "malicious",
            allowanceRaw: "5",
            isUnlimited: false,
            riskLevel: "critical",
            riskReasons: ["Known malicious contract", "Unknown spender contract"],
            riskScore: 35
          })
        ]
      })
    );

    const lines = csv.trimEnd().split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[1]).toBe(
      [
        "ethereum",
        DAI,
        "DAI",
        UNISWAP_V3_ROUTER_2,
        "Uniswap V3: Router 2",
        "trusted",
        "1000",
        "0.000000000000001",
        "0.00",
        "false",
        "safe",
        "2",
        "",
        `https://revoke.cash/address/${WALLET}?chainId=1`
      ].join(",")
    );
    expect(lines[2]).toContain(`,"Evil, ""Inc""",malicious,5,`);
    expect(lines[2]).toContain(",critical,35,Known malicious contract;Unknown spender contract,");
  });
});

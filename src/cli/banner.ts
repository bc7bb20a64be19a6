const BANNER = `
  ┌─┐┬┌─┐┌┬┐┌─┐┬─┐
  ├─┘││   │ │ │├┬┘
  ┴  ┴└─┘ ┴ └─┘┴└─
`;

const TAGLINES = [
  "Words in, pictures out.",
  "One prompt at a time.",
  "Rationed imagination.",
];

export function printBanner(version: string): void {
  const tagline = TAGLINES[Math.floor(Math.random() * TAGLINES.length)];
  console.log(BANNER);
  console.log(`  v${version} — ${tagline}\n`);
}

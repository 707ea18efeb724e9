const INVITE_REGEX = /(?:https?:\/\/)?(?:www\.)?(?:discord\.gg|discord(?:app)?\.com\/invite)\/([A-Za-z0-9-]+)/gi;

export function extractInviteCodes(content: string | null | undefined): string[] {
  if (!content) return [];

  const codes = new Set<string>();
  INVITE_REGEX.lastIndex = 0;
  let match: RegExpExecArray | null;

  while ((match = INVITE_REGEX.exec(content)) !== null) {
    const code = match[1];
    if (code) codes.add(code);
  }

  return [...codes];
}

export function containsInvite(content: string | null | undefined): boolean {
  return extractInviteCodes(content).length > 0;
}

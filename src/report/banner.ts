export const BANNER: readonly string[] = Object.freeze([
  "        ▲",
  "       ▲▲▲",
  "      ▲▲▲▲▲",
  "     ▲▲▲▲▲▲▲",
  "    ▲▲▲▲▲▲▲▲▲",
  "   ▲▲▲▲▲▲▲▲▲▲▲",
  "  ▲▲▲▲▲▲▲▲▲▲▲▲▲",
]);

/** Column where field text starts, two spaces past the widest art line. */
export const BANNER_WIDTH = Math.max(...BANNER.map((line) => line.length)) + 2;

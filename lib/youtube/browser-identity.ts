/** Desktop Chrome identity presented by every outbound YouTube request and the recovery browser. */
export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export const BROWSER_ACCEPT_LANGUAGE = "en-US,en;q=0.9";

/** Lets the consent wall through when no real session cookies are available. */
export const CONSENT_COOKIE = "CONSENT=YES+cb.20210328-17-p0.en+FX+667; SOCS=CAI";

export const YTDLP_PLAYER_CLIENTS = "youtube:player_client=android,web";

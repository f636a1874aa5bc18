// ============================================================================
// BROWSER LAUNCH FLAGS
// ============================================================================
// Flags for headless harvesting sessions on Linux/CI hosts

export const HARVEST_BROWSER_FLAGS = [
  // =========================================================================
  // SANDBOX / CONTAINER
  // =========================================================================
  '--no-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',

  // =========================================================================
  // ANTI-DETECTION
  // =========================================================================
  '--disable-blink-features=AutomationControlled',

  // =========================================================================
  // PERMISSIONS
  // =========================================================================
  // Notification and other permission prompts resolve as denied
  '--deny-permission-prompts',

  // =========================================================================
  // WINDOW CONFIGURATION
  // =========================================================================
  '--window-size=1920,1080',
  '--no-first-run',
  '--no-default-browser-check',
  '--mute-audio',
];

// Flags to ignore from Playwright's defaults
export const IGNORED_DEFAULT_ARGS = ['--enable-automation'];

export const HARVEST_VIEWPORT = { width: 1920, height: 1080 };

/**
 * Desktop Chrome user agents, matching the launched engine; one is picked at random per session
 */
export const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0.0.0 Safari/537.36',
] as const;

// Hides the automation flag before any page script runs
export const HIDE_WEBDRIVER_SCRIPT =
  "Object.defineProperty(navigator, 'webdriver', { get: () => undefined });";

/**
 * x.com DOM selectors, kept in one file so a UI change means one edit.
 *
 * X renders obfuscated class names, so these lean on `data-testid`, `name`
 * and ARIA attributes. Menu entries use Puppeteer's `::-p-text()` pseudo
 * selector since they carry no test id.
 */

export const SELECTORS = {
  login: {
    usernameInput: 'input[name="text"]',
    passwordInput: 'input[name="password"]',
    /** Present once the home timeline has loaded. */
    appLoaded: '[data-testid="AppTabBar_Home_Link"]',
  },

  compose: {
    textarea: '[data-testid="tweetTextarea_0"]',
    fileInput: 'input[data-testid="fileInput"]',
    attachments: '[data-testid="attachments"]',
    submitButton: '[data-testid="tweetButton"]',
  },

  timeline: {
    tweet: 'article[data-testid="tweet"]',
    tweetText: '[data-testid="tweetText"]',
    statusLink: 'a[href*="/status/"]',
    userName: '[data-testid="User-Name"]',
  },

  actions: {
    like: '[data-testid="like"]',
    retweet: '[data-testid="retweet"]',
    retweetConfirm: '[data-testid="retweetConfirm"]',
    caret: '[data-testid="caret"]',
    deleteMenuItem: '[role="menuitem"] ::-p-text(Delete)',
    editMenuItem: '[role="menuitem"] ::-p-text(Edit)',
    confirmDelete: '[data-testid="confirmationSheetConfirm"]',
  },
} as const;

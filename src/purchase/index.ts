export type { IPurchaseAssist, PurchaseAssistMode } from './purchase-assist.interface.js';
export { BrowserPurchaseAssist, type BrowserLauncher } from './browser.purchase-assist.js';
export { ConsolePurchaseAssist } from './console.purchase-assist.js';

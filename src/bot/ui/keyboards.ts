import { InlineKeyboard, Keyboard } from "grammy";
import { BUTTONS } from "./texts.js";

export function mainKeyboard(): Keyboard {
  return new Keyboard()
    .text(BUTTONS.scan)
    .text(BUTTONS.analyze)
    .row()
    .text(BUTTONS.chains)
    .text(BUTTONS.help)
    .resized();
}

export function reportInlineKeyboard(scanId: string): InlineKeyboard {
  return new InlineKeyboard()
    .text("📌 Show critical", `showcrit:${scanId}`)
    .row()
    .text("📄 CSV", `downloadcsv:${scanId}`)
    .text("🌐 HTML", `downloadhtml:${scanId}`);
}

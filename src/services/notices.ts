// src/services/notices.ts
import type { Notice } from "../schemas.js";

/** Inline messages for one request, shown next to the result in the form. */
export class Notices {
  readonly items: Notice[] = [];

  error(message: string) {
    console.error("⚠️", message);
    this.items.push({ level: "error", message });
  }

  warning(message: string) {
    this.items.push({ level: "warning", message });
  }
}

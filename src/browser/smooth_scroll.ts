import { CONFIG } from "./config.js";
import { Binding } from "./listeners.js";

export class SmoothScroll extends Binding {
  constructor() {
    super();
    document.addEventListener("click", (event) => this.onClick(event), { signal: this.signal });
  }

  private onClick(event: MouseEvent) {
    if (!(event.target instanceof Element)) return;
    const link = event.target.closest('a[href^="#"]');
    if (!link) return;

    const href = link.getAttribute("href");
    if (!href || href === "#") return;

    let id: string;
    try {
      id = decodeURIComponent(href.slice(1));
    } catch {
      // malformed escape such as "#%"
      return;
    }
    const target = document.getElementById(id);
    if (!target) return;

    event.preventDefault();
    // fixed header
    window.scrollTo({ top: Math.max(0, target.offsetTop - CONFIG.headerOffset), behavior: "smooth" });
    history.pushState(null, "", href);
  }
}

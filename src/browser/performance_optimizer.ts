import { CONFIG } from "./config.js";

export class PerformanceOptimizer {
  constructor(private readonly criticalImages: readonly string[] = CONFIG.criticalImages) {
    this.optimizeImages();
    this.preloadCriticalResources();
  }

  /** Images below the fold without an explicit `loading` attribute load lazily. */
  optimizeImages() {
    document.querySelectorAll<HTMLImageElement>("img:not([loading])").forEach((img) => {
      if (img.getBoundingClientRect().top > window.innerHeight) {
        img.setAttribute("loading", "lazy");
      }
    });
  }

  preloadCriticalResources() {
    for (const src of this.criticalImages) {
      const existing = Array.from(document.head.querySelectorAll<HTMLLinkElement>('link[rel="preload"]')).some(
        (link) => link.getAttribute("href") === src
      );
      if (existing) continue;
      const link = document.createElement("link");
      link.rel = "preload";
      link.setAttribute("as", "image");
      link.href = src;
      document.head.appendChild(link);
    }
  }
}

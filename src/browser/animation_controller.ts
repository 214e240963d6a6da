import { ANIMATION_SELECTOR, CONFIG, LAZY_IMAGE_SELECTOR } from "./config.js";
import { Binding } from "./listeners.js";

export type ImageFactory = () => HTMLImageElement;

function hasIntersectionObserver(): boolean {
  return typeof IntersectionObserver === "function";
}

/**
 * Scroll-triggered reveal animations, lazy images and the reading progress bar.
 */
export class AnimationController extends Binding {
  private readonly observers: IntersectionObserver[] = [];
  private readonly timers: ReturnType<typeof setTimeout>[] = [];
  progressBar: HTMLDivElement | null = null;

  constructor(private readonly createImage: ImageFactory = () => new Image()) {
    super();
    if (document.readyState === "loading") {
      document.addEventListener("DOMContentLoaded", () => this.start(), { signal: this.signal, once: true });
    } else {
      this.start();
    }
  }

  private start() {
    this.setupAnimations();
    this.setupLazyLoading();
    this.setupScrollProgress();
  }

  setupAnimations() {
    if (!hasIntersectionObserver()) {
      this.fallbackAnimations();
      return;
    }

    const observer = new IntersectionObserver((entries) => {
      entries.forEach((entry, index) => {
        if (!entry.isIntersecting) return;
        this.later(() => entry.target.classList.add("animated"), index * CONFIG.animationDelay);
        observer.unobserve(entry.target);
      });
    }, CONFIG.observerOptions);
    this.observers.push(observer);

    document.querySelectorAll(ANIMATION_SELECTOR).forEach((el) => observer.observe(el));
  }

  setupLazyLoading() {
    if (!hasIntersectionObserver()) {
      this.fallbackLazyLoading();
      return;
    }

    const observer = new IntersectionObserver((entries) => {
      entries.forEach((entry) => {
        if (!entry.isIntersecting) return;
        if (entry.target instanceof HTMLImageElement) this.loadImage(entry.target);
        else entry.target.classList.add("loaded");
        observer.unobserve(entry.target);
      });
    }, CONFIG.lazyImageOptions);
    this.observers.push(observer);

    document.querySelectorAll(LAZY_IMAGE_SELECTOR).forEach((img) => {
      img.classList.add("lazy-image");
      observer.observe(img);
    });
  }

  loadImage(img: HTMLImageElement) {
    const src = img.dataset.src;
    if (!src) {
      img.classList.add("loaded");
      return;
    }
    const preload = this.createImage();
    preload.onload = () => {
      img.src = src;
      img.classList.add("loaded");
      img.removeAttribute("data-src");
    };
    // drop the loading state even when the image fails
    preload.onerror = () => {
      img.classList.add("loaded");
    };
    preload.src = src;
  }

  setupScrollProgress() {
    const bar = document.createElement("div");
    bar.className = "scroll-progress";
    bar.style.width = "0%";
    document.body.appendChild(bar);
    this.progressBar = bar;

    let ticking = false;
    window.addEventListener(
      "scroll",
      () => {
        if (ticking) return;
        ticking = true;
        requestAnimationFrame(() => {
          this.updateProgress();
          ticking = false;
        });
      },
      { passive: true, signal: this.signal }
    );
    this.updateProgress();
  }

  updateProgress(scrollTop = window.scrollY || document.documentElement.scrollTop) {
    if (!this.progressBar) return;
    const scrollable = document.documentElement.scrollHeight - window.innerHeight;
    const percent = scrollable > 0 ? (scrollTop / scrollable) * 100 : 0;
    this.progressBar.style.width = `${Math.min(100, Math.max(0, percent))}%`;
  }

  fallbackAnimations() {
    document.querySelectorAll(ANIMATION_SELECTOR).forEach((el, index) => {
      this.later(() => el.classList.add("animated"), index * CONFIG.animationDelay);
    });
  }

  fallbackLazyLoading() {
    document.querySelectorAll<HTMLImageElement>("img[data-src]").forEach((img) => {
      const src = img.dataset.src;
      if (src) {
        img.src = src;
        img.removeAttribute("data-src");
      }
      img.classList.add("loaded");
    });
  }

  private later(fn: () => void, delayMs: number) {
    this.timers.push(setTimeout(fn, delayMs));
  }

  override dispose() {
    super.dispose();
    this.observers.forEach((observer) => observer.disconnect());
    this.timers.forEach((timer) => clearTimeout(timer));
    this.progressBar?.remove();
  }
}

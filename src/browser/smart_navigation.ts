import { CONFIG } from "./config.js";
import { Binding } from "./listeners.js";

/** Hides the fixed navbar while scrolling down and brings it back when scrolling up. */
export class SmartNavigation extends Binding {
  private lastScrollY = window.scrollY;
  private hidden = false;
  readonly navbar: HTMLElement | null;

  constructor(private readonly threshold: number = CONFIG.navHideThreshold) {
    super();
    this.navbar = document.querySelector<HTMLElement>(".main-navbar");
    if (this.navbar) this.init();
  }

  get isHidden(): boolean {
    return this.hidden;
  }

  private init() {
    this.navbar?.classList.add("smart-nav");

    let ticking = false;
    window.addEventListener(
      "scroll",
      () => {
        if (ticking) return;
        ticking = true;
        requestAnimationFrame(() => {
          this.handleScroll();
          ticking = false;
        });
      },
      { passive: true, signal: this.signal }
    );
  }

  handleScroll(currentScrollY = window.scrollY) {
    const delta = currentScrollY - this.lastScrollY;

    if (currentScrollY < this.threshold) {
      this.showNavbar();
    } else if (delta > 0 && !this.hidden) {
      this.hideNavbar();
    } else if (delta < -CONFIG.navShowScrollUp && this.hidden) {
      this.showNavbar();
    }

    this.lastScrollY = currentScrollY;
  }

  hideNavbar() {
    if (!this.navbar || this.hidden) return;
    this.navbar.classList.add("nav-hidden");
    this.navbar.classList.remove("nav-visible");
    this.hidden = true;
  }

  showNavbar() {
    if (!this.navbar) return;
    if (!this.hidden && this.navbar.classList.contains("nav-visible")) return;
    this.navbar.classList.remove("nav-hidden");
    this.navbar.classList.add("nav-visible");
    this.hidden = false;
  }
}

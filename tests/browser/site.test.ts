// @vitest-environment jsdom
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { startSite, type SiteScripts } from "../../src/browser/index.js";

let site: SiteScripts | null = null;

beforeEach(() => {
  vi.useFakeTimers();
  vi.stubGlobal("IntersectionObserver", undefined);
  document.head.innerHTML = "";
  document.body.innerHTML = `
    <nav class="main-navbar"></nav>
    <button type="button" id="book" data-modal="appointment">Reservar</button>
  `;
});

afterEach(() => {
  site?.dispose();
  site = null;
  vi.useRealTimers();
  vi.unstubAllGlobals();
});

describe("startSite", () => {
  it("wires every behaviour and exposes the modal system", () => {
    site = startSite();
    expect(window.modalSystem).toBe(site.modal);
    expect(document.querySelector(".modal-overlay")).not.toBeNull();
    expect(document.querySelector(".scroll-progress")).not.toBeNull();
    expect(document.querySelector(".main-navbar")?.classList.contains("smart-nav")).toBe(true);
    expect(document.head.querySelectorAll('link[rel="preload"]')).toHaveLength(2);
  });

  it("opens modals from page triggers", () => {
    site = startSite();
    document.getElementById("book")?.click();
    expect(site.modal.activeModal).toBe("appointment");
  });

  it("tears everything down on dispose", () => {
    site = startSite();
    site.dispose();
    site = null;
    expect(window.modalSystem).toBeUndefined();
    expect(document.querySelector(".modal-overlay")).toBeNull();
    expect(document.querySelector(".scroll-progress")).toBeNull();
  });
});

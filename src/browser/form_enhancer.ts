import { CONFIG } from "./config.js";
import { Binding } from "./listeners.js";

function markValue(input: HTMLInputElement | HTMLTextAreaElement) {
  const parent = input.parentElement;
  if (!parent) return;
  parent.classList.toggle("input-has-value", input.value.trim() !== "");
}

export class FormEnhancer extends Binding {
  constructor() {
    super();
    this.setupFormAnimations();
  }

  setupFormAnimations() {
    document.querySelectorAll("form").forEach((form) => {
      form.addEventListener(
        "submit",
        () => {
          const button = form.querySelector<HTMLButtonElement>('button[type="submit"]');
          if (!button) return;
          button.classList.add("loading");
          button.disabled = true;
          setTimeout(() => {
            button.classList.remove("loading");
            button.disabled = false;
          }, CONFIG.submitButtonResetMs);
        },
        { signal: this.signal }
      );

      form.querySelectorAll<HTMLInputElement | HTMLTextAreaElement>("input, textarea").forEach((input) => {
        input.addEventListener("focus", () => input.parentElement?.classList.add("input-focused"), {
          signal: this.signal
        });
        input.addEventListener(
          "blur",
          () => {
            input.parentElement?.classList.remove("input-focused");
            markValue(input);
          },
          { signal: this.signal }
        );
        if (input.value.trim() !== "") markValue(input);
      });
    });
  }
}

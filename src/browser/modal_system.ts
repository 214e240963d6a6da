import { CONFIG } from "./config.js";
import { Binding } from "./listeners.js";

export type ModalType = "contact" | "appointment" | "info";

declare global {
  interface Window {
    modalSystem?: ModalSystem;
  }
}

const MODAL_TYPES: readonly ModalType[] = ["contact", "appointment", "info"];

function isModalType(value: string | undefined): value is ModalType {
  return MODAL_TYPES.some((type) => type === value);
}

const FORM_ACTIONS = `
        <div class="form-actions">
          <button type="button" class="btn-modern secondary-btn" data-modal-close>Cancelar</button>
          <button type="submit" class="btn-modern primary-btn">__SUBMIT__</button>
        </div>`;

export const CONTACT_FORM = `
      <form class="modal-form" id="contactModal" novalidate>
        <div class="form-row">
          <div class="form-group">
            <label for="modal-name">Nombre completo</label>
            <input type="text" id="modal-name" name="name" required>
          </div>
          <div class="form-group">
            <label for="modal-email">Email</label>
            <input type="email" id="modal-email" name="email" required>
          </div>
        </div>
        <div class="form-group">
          <label for="modal-phone">Teléfono</label>
          <input type="tel" id="modal-phone" name="phone">
        </div>
        <div class="form-group">
          <label for="modal-message">Mensaje</label>
          <textarea id="modal-message" name="message" rows="4" required></textarea>
        </div>${FORM_ACTIONS.replace("__SUBMIT__", "Enviar Mensaje")}
      </form>`;

export const APPOINTMENT_FORM = `
      <form class="modal-form" id="appointmentModal" novalidate>
        <div class="form-row">
          <div class="form-group">
            <label for="appt-name">Nombre completo</label>
            <input type="text" id="appt-name" name="name" required>
          </div>
          <div class="form-group">
            <label for="appt-email">Email</label>
            <input type="email" id="appt-email" name="email" required>
          </div>
        </div>
        <div class="form-row">
          <div class="form-group">
            <label for="appt-phone">Teléfono</label>
            <input type="tel" id="appt-phone" name="phone" required>
          </div>
          <div class="form-group">
            <label for="appt-date">Fecha preferida</label>
            <input type="date" id="appt-date" name="preferred_date">
          </div>
        </div>
        <div class="form-group">
          <label for="appt-service">Tipo de servicio</label>
          <select id="appt-service" name="service_type">
            <option value="">Seleccionar servicio</option>
            <option value="root-canal">Tratamiento de Conductos</option>
            <option value="retreatment">Retratamiento</option>
            <option value="microsurgery">Microcirugía</option>
            <option value="trauma">Trauma Dental</option>
            <option value="bleaching">Blanqueamiento Interno</option>
          </select>
        </div>
        <div class="form-group">
          <label for="appt-details">Detalles adicionales</label>
          <textarea id="appt-details" name="details" rows="3" placeholder="Describe tu situación actual"></textarea>
        </div>${FORM_ACTIONS.replace("__SUBMIT__", "Solicitar Cita")}
      </form>`;

export class ModalSystem extends Binding {
  activeModal: ModalType | null = null;
  private closeTimer: ReturnType<typeof setTimeout> | null = null;

  constructor() {
    super();
    this.createModalContainer();
    this.setupModalTriggers();
  }

  get overlay(): HTMLElement | null {
    return document.querySelector<HTMLElement>(".modal-overlay");
  }

  private createModalContainer() {
    if (this.overlay) return;

    const overlay = document.createElement("div");
    overlay.className = "modal-overlay";
    overlay.innerHTML = `
      <div class="modal-container" role="dialog" aria-modal="true">
        <div class="modal-header">
          <h3 class="modal-title"></h3>
          <button type="button" class="modal-close" aria-label="Cerrar modal">×</button>
        </div>
        <div class="modal-content"></div>
      </div>
    `;
    document.body.appendChild(overlay);

    overlay.addEventListener(
      "click",
      (event) => {
        const target = event.target;
        if (target === overlay) {
          this.closeModal();
          return;
        }
        if (target instanceof Element && target.closest(".modal-close, [data-modal-close]")) {
          this.closeModal();
        }
      },
      { signal: this.signal }
    );

    document.addEventListener(
      "keydown",
      (event) => {
        if (event.key === "Escape" && this.activeModal) this.closeModal();
      },
      { signal: this.signal }
    );
  }

  private setupModalTriggers() {
    document.addEventListener(
      "click",
      (event) => {
        if (!(event.target instanceof Element)) return;
        const trigger = event.target.closest<HTMLElement>("[data-modal]");
        if (!trigger) return;
        const type = trigger.dataset.modal;
        if (!isModalType(type)) return;
        event.preventDefault();
        this.openModal(type, trigger);
      },
      { signal: this.signal }
    );
  }

  openModal(type: ModalType, trigger?: HTMLElement) {
    const overlay = this.overlay;
    const container = overlay?.querySelector<HTMLElement>(".modal-container");
    const title = overlay?.querySelector<HTMLElement>(".modal-title");
    const content = overlay?.querySelector<HTMLElement>(".modal-content");
    if (!overlay || !container || !title || !content) return;

    if (this.closeTimer) {
      clearTimeout(this.closeTimer);
      this.closeTimer = null;
      container.classList.remove("modal-exit");
    }

    switch (type) {
      case "contact":
        title.textContent = "Contactar Especialista";
        content.innerHTML = CONTACT_FORM;
        break;
      case "appointment":
        title.textContent = "Reservar Consulta";
        content.innerHTML = APPOINTMENT_FORM;
        break;
      case "info":
        title.textContent = trigger?.dataset.title || "Información";
        content.textContent = trigger?.dataset.content || "Contenido no disponible";
        break;
    }

    overlay.classList.add("modal-active");
    container.classList.add("modal-enter");
    document.body.classList.add("modal-open");
    this.activeModal = type;

    const firstFocusable = content.querySelector<HTMLElement>("input, button, textarea, select");
    if (firstFocusable) {
      setTimeout(() => firstFocusable.focus(), CONFIG.modalFocusDelayMs);
    }
  }

  closeModal() {
    const overlay = this.overlay;
    const container = overlay?.querySelector<HTMLElement>(".modal-container");
    if (!overlay || !container) return;

    container.classList.remove("modal-enter");
    container.classList.add("modal-exit");

    if (this.closeTimer) clearTimeout(this.closeTimer);
    this.closeTimer = setTimeout(() => {
      overlay.classList.remove("modal-active");
      container.classList.remove("modal-exit");
      document.body.classList.remove("modal-open");
      this.activeModal = null;
      this.closeTimer = null;
    }, CONFIG.modalExitMs);
  }

  override dispose() {
    super.dispose();
    if (this.closeTimer) clearTimeout(this.closeTimer);
    this.overlay?.remove();
  }
}

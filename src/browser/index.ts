import { AnimationController } from "./animation_controller.js";
import { FormEnhancer } from "./form_enhancer.js";
import { FormValidator } from "./form_validator.js";
import { ModalSystem } from "./modal_system.js";
import { PerformanceOptimizer } from "./performance_optimizer.js";
import { SmartNavigation } from "./smart_navigation.js";
import { SmoothScroll } from "./smooth_scroll.js";

export { AnimationController, FormEnhancer, FormValidator, ModalSystem, PerformanceOptimizer, SmartNavigation, SmoothScroll };

export type SiteScripts = {
  animations: AnimationController;
  forms: FormEnhancer;
  validator: FormValidator;
  smoothScroll: SmoothScroll;
  performance: PerformanceOptimizer;
  navigation: SmartNavigation;
  modal: ModalSystem;
  dispose(): void;
};

export function startSite(): SiteScripts {
  const modal = new ModalSystem();
  window.modalSystem = modal;

  const scripts = {
    animations: new AnimationController(),
    forms: new FormEnhancer(),
    validator: new FormValidator({ modal: () => modal }),
    smoothScroll: new SmoothScroll(),
    performance: new PerformanceOptimizer(),
    navigation: new SmartNavigation(),
    modal
  };

  return {
    ...scripts,
    dispose() {
      scripts.animations.dispose();
      scripts.forms.dispose();
      scripts.validator.dispose();
      scripts.smoothScroll.dispose();
      scripts.navigation.dispose();
      scripts.modal.dispose();
      if (window.modalSystem === modal) delete window.modalSystem;
    }
  };
}

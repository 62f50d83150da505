export { TEMPLATE_REGISTRY, getTemplate, listTemplates, registerTemplate } from "./registry.js";
export type { PropertyTemplate, TemplateDefaults, TemplateRules } from "./registry.js";
export { routeByPropertyType, selectTemplate, PROPERTY_TYPE_TEMPLATES } from "./router.js";
export { prepareSimulationData, buildSimulationProperty } from "./factory.js";
export type { PreparedSimulationData, TemplateInput } from "./factory.js";
export { TemplateError, UnknownPropertyTypeError, TemplateValidationError } from "./errors.js";

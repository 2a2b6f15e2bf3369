export * from "./enums";
export * from "./customer";
export * from "./charge";
export * from "./order";
export * from "./buyer";
export * from "./card-token";
export * from "./installment";
export * from "./page";
export * from "./requests";

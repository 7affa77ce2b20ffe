// Lets react-dom's act() flush updates without warnings.
Reflect.set(globalThis, "IS_REACT_ACT_ENVIRONMENT", true);

export {};

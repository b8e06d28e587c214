export { BacksubToyNode } from "./backsub-node";
export { ForwardToyNode } from "./forward-node";
export { ReversedToyNode } from "./reversed-node";
export { createToyArguments, type ToyArguments, ToyCache } from "./toy-cache";

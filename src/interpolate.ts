import { Bindings, TargetTemplate } from "./rules";

export function interpolate(target: TargetTemplate, bindings: Bindings): string {
  return target.parts
    .map((part) => {
      if (part.kind === "literal") {
        return part.text;
      }
      const value = bindings.get(part.name);
      if (value == null) {
        // parseTarget only accepts names the source pattern binds
        throw new Error(
          `interpolate: \`${part.name}\` is not bound for target \`${target.source}\``
        );
      }
      return value;
    })
    .join("/");
}

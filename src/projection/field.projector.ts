export type ResultObject = Record<string, unknown>;

/**
 * Keep only the keys present in both the object and `fields`. An empty field
 * list yields empty objects, not whole ones. Missing keys are left out.
 */
export function project(objects: readonly ResultObject[], fields: readonly string[]): ResultObject[] {
    const wanted = new Set(fields);
    return objects.map(object => {
        const projected: ResultObject = {};
        for (const key of Object.keys(object)) {
            if (wanted.has(key)) {
                projected[key] = object[key];
            }
        }
        return projected;
    });
}

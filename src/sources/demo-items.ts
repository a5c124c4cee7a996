export interface DemoItem {
  id: number
  label: string
}

export const createDemoItems = (total: number): DemoItem[] =>
  Array.from({ length: Math.max(0, total) }, (_value, index) => ({
    id: index,
    label: `Item #${String(index + 1).padStart(3, "0")}`,
  }))

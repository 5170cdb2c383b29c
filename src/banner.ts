type Setting = [label: string, value: string]

/**
 * A rule of `=` of the given width with `title` set in the middle, e.g.
 * `rule(30, "SPEEDLOG")` is `"========== SPEEDLOG =========="`. Titles too
 * long for the width keep two `=` on either side.
 */
export function rule(width: number, title?: string): string {
    if (title === undefined || title.length === 0) {
        return "=".repeat(width)
    }
    const label = ` ${title} `
    const left = Math.max(2, Math.floor((width - label.length) / 2))
    const right = Math.max(2, width - left - label.length)
    return "=".repeat(left) + label + "=".repeat(right)
}

// Labels padded to a common width: "  Interval : 15 min"
export function formatSettings(settings: Setting[]): string[] {
    const labelWidth = Math.max(0, ...settings.map(([label]) => label.length))
    return settings.map(([label, value]) => `  ${label.padEnd(labelWidth)} : ${value}`)
}

export function displaySettingsBanner(title: string, settings: Setting[], width: number = 60): void {
    console.log(["", rule(width, title), ...formatSettings(settings), rule(width), ""].join("\n"))
}

import { Resvg } from "@resvg/resvg-js";

export function svgToPng(svg: string, width: number): Buffer {
    const resvg = new Resvg(svg, {
        fitTo: { mode: "width", value: width },
    });
    const rendered = resvg.render();
    return Buffer.from(rendered.asPng());
}

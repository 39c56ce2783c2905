import type { IccProfileInfo } from '../../../shared/types.js';
import { escapeHtml } from '../utils/html.js';

export interface IndexPageOptions {
    pdfProfiles: readonly string[];
    iccProfiles: IccProfileInfo[];
}

function option(value: string, label: string, selected = false): string {
    return `<option value="${escapeHtml(value)}"${selected ? ' selected' : ''}>${escapeHtml(label)}</option>`;
}

// Browser-side script: reads files as data URLs and posts the form as JSON.
const FORM_SCRIPT = `
const form = document.getElementById('pdf-form');
const statusEl = document.getElementById('status');
const previewEl = document.getElementById('preview');

function readFile(name) {
    const input = form.elements.namedItem(name);
    const file = input && input.files && input.files[0];
    if (!file) return Promise.resolve(undefined);
    return new Promise(function (resolve, reject) {
        const reader = new FileReader();
        reader.onload = function () { resolve({ filename: file.name, data: String(reader.result) }); };
        reader.onerror = function () { reject(reader.error); };
        reader.readAsDataURL(file);
    });
}

function checked(name) {
    return form.elements.namedItem(name).checked;
}

function value(name) {
    return form.elements.namedItem(name).value;
}

async function buildBody() {
    return {
        apiKey: value('apiKey'),
        cardType: value('cardType'),
        fitMode: value('fitMode'),
        pdfProfile: value('pdfProfile'),
        iccProfile: value('iccProfile'),
        backgroundColor: value('backgroundColor'),
        bleed: checked('bleed'),
        trueBlack: checked('trueBlack'),
        cmykColors: checked('cmykColors'),
        forceCmyk: checked('forceCmyk'),
        testMode: checked('testMode'),
        provideAllImages: checked('provideAllImages'),
        image: await readFile('image'),
        backImage: await readFile('backImage'),
        insideImage: await readFile('insideImage'),
        iccFile: await readFile('iccFile'),
    };
}

async function post(path) {
    statusEl.textContent = 'Working...';
    const res = await fetch(path, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(await buildBody()),
    });
    if (!res.ok) {
        const payload = await res.json().catch(function () { return { error: 'HTTP ' + res.status }; });
        statusEl.textContent = payload.error;
        return null;
    }
    statusEl.textContent = '';
    return res;
}

form.addEventListener('submit', async function (event) {
    event.preventDefault();
    const res = await post('/generate');
    if (!res) return;
    const disposition = res.headers.get('Content-Disposition') || '';
    const match = /filename="?([^";]+)"?/.exec(disposition);
    const link = document.createElement('a');
    link.href = URL.createObjectURL(await res.blob());
    link.download = match ? match[1] : 'output.pdf';
    link.click();
    URL.revokeObjectURL(link.href);
});

document.getElementById('preview-button').addEventListener('click', async function () {
    const res = await post('/preview-html');
    if (!res) return;
    const payload = await res.json();
    previewEl.srcdoc = payload.html;
    previewEl.hidden = false;
});
`;

export function renderIndexPage({ pdfProfiles, iccProfiles }: IndexPageOptions): string {
    const profileOptions = pdfProfiles
        .map((profile, index) => option(profile, profile || 'Default (no profile)', index === 0))
        .join('\n                ');

    const iccOptions = [
        option('', 'None'),
        ...iccProfiles.map((profile) => option(profile.filename, profile.name)),
    ].join('\n                ');

    return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <title>PDF Output Tester</title>
    <style>
        body { font-family: system-ui, sans-serif; max-width: 48rem; margin: 2rem auto; color: #222; }
        fieldset { margin-bottom: 1rem; border: 1px solid #ddd; border-radius: 6px; }
        label { display: block; margin: 0.4rem 0; }
        #status { color: #b00020; min-height: 1.2rem; }
        #preview { width: 100%; height: 40rem; border: 1px solid #ddd; }
    </style>
</head>
<body>
    <h1>PDF Output Tester</h1>
    <form id="pdf-form">
        <fieldset>
            <legend>DocRaptor</legend>
            <label>API key <input type="password" name="apiKey" autocomplete="off"></label>
            <label><input type="checkbox" name="testMode" checked> Test mode (watermarked, free)</label>
        </fieldset>
        <fieldset>
            <legend>Images</legend>
            <label>Front image <input type="file" name="image" accept="image/*" required></label>
            <label><input type="checkbox" name="provideAllImages"> Provide all images</label>
            <label>Back image <input type="file" name="backImage" accept="image/*"></label>
            <label>Inside image (folded cards) <input type="file" name="insideImage" accept="image/*"></label>
        </fieldset>
        <fieldset>
            <legend>Layout</legend>
            <label>Card type
                <select name="cardType">
                    ${option('flat', 'Flat (front and back pages)', true)}
                    ${option('folded', 'Folded (outside and inside spreads)')}
                </select>
            </label>
            <label>Image fit
                <select name="fitMode">
                    ${option('cover', 'Cover', true)}
                    ${option('contain', 'Contain')}
                    ${option('fill', 'Fill')}
                </select>
            </label>
            <label><input type="checkbox" name="bleed"> Add 1/8" bleed and crop marks</label>
            <label>Background <input type="color" name="backgroundColor" value="#ffffff"></label>
        </fieldset>
        <fieldset>
            <legend>Color</legend>
            <label>PDF profile
                <select name="pdfProfile">
                ${profileOptions}
                </select>
            </label>
            <label>ICC profile
                <select name="iccProfile">
                ${iccOptions}
                </select>
            </label>
            <label>Upload ICC profile <input type="file" name="iccFile" accept=".icc"></label>
            <label><input type="checkbox" name="trueBlack" checked> Use true black</label>
            <label><input type="checkbox" name="cmykColors"> Use CMYK colors</label>
            <label><input type="checkbox" name="forceCmyk"> Force CMYK</label>
        </fieldset>
        <button type="submit">Generate PDF</button>
        <button type="button" id="preview-button">Preview HTML</button>
        <p id="status"></p>
    </form>
    <iframe id="preview" hidden title="HTML preview"></iframe>
    <script>${FORM_SCRIPT}</script>
</body>
</html>`;
}

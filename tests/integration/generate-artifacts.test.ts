import { describe, it, expect } from 'vitest';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { loadModel } from '../../src/lib/loader/index.js';
import { CodeGenerator, generateArtifacts } from '../../src/lib/generator/index.js';
import { DEFAULT_GENERATOR_CONFIG } from '../../src/types/config.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const modelPath = join(__dirname, '../fixtures/sample-model.json');

const HEADER = '// File generated by lsp-specgen\n// DO NOT MAKE ANY CHANGES HERE\n\n#pragma once\n\n';

describe('Artifact generation from a model document', () => {
  it('should order declarations in dependency waves', async () => {
    const generator = new CodeGenerator();
    const prepared = generator.prepare(await loadModel(modelPath));

    expect(
      prepared.waves.map((wave) => wave.map((entry) => entry.declaration.name)),
    ).toEqual([
      ['DocumentUri', 'integer', 'SelectionRange'],
      ['ProgressToken', 'TextDocumentIdentifier'],
      ['VersionedTextDocumentIdentifier', 'SetTraceParams'],
    ]);
    expect(generator.summarize(prepared)).toEqual({
      enumerations: 2,
      typeAliases: 3,
      interfaces: 4,
      notifications: 2,
      requests: 2,
      waves: [3, 2, 2],
    });
  });

  it('should render the declarations header', async () => {
    const { artifacts } = generateArtifacts(await loadModel(modelPath));

    expect(artifacts[0].content).toBe(
      HEADER +
        '#include <nlohmann/json.hpp>\n' +
        '#include <memory>\n' +
        '#include <optional>\n' +
        '#include <string>\n' +
        '#include <tuple>\n' +
        '#include <unordered_map>\n' +
        '#include <variant>\n' +
        '\n' +
        'namespace Lsp {\n' +
        '\n' +
        'enum class TraceValue {\n' +
        '    Off,\n' +
        '    Messages,\n' +
        '    Verbose,\n' +
        '};\n' +
        '\n' +
        '/**\n' +
        ' * Known error codes for an `InitializeErrorCodes`;\n' +
        ' */\n' +
        'enum class InitializeErrorCodes {\n' +
        '    /**\n' +
        '     * @deprecated use InitializeResult\n' +
        '     */\n' +
        '    UnknownProtocolVersion = 1,\n' +
        '};\n' +
        '\n' +
        'using DocumentUri = std::string;\n' +
        '\n' +
        'struct SelectionRange\n' +
        '{\n' +
        '    std::unique_ptr<SelectionRange> parent;\n' +
        '};\n' +
        '\n' +
        'using ProgressToken = std::variant<int, std::string>;\n' +
        '\n' +
        '/**\n' +
        ' * A literal to identify a text document in the client.\n' +
        ' */\n' +
        'struct TextDocumentIdentifier\n' +
        '{\n' +
        '    /**\n' +
        "     * The text document's uri.\n" +
        '     */\n' +
        '    DocumentUri uri;\n' +
        '};\n' +
        '\n' +
        'struct VersionedTextDocumentIdentifier : public TextDocumentIdentifier\n' +
        '{\n' +
        '    integer version;\n' +
        '};\n' +
        '\n' +
        'struct SetTraceParams\n' +
        '{\n' +
        '    TraceValue value;\n' +
        '    std::optional<ProgressToken> token;\n' +
        '};\n' +
        '}\n',
    );
  });

  it('should render the bindings header', async () => {
    const { artifacts } = generateArtifacts(await loadModel(modelPath));

    expect(artifacts[1].content).toBe(
      HEADER +
        '#include "json.h"\n' +
        '#include "types.h"\n' +
        '\n' +
        'namespace Lsp {\n' +
        '\n' +
        'JSONIFY_ENUM(TraceValue, {\n' +
        '    {TraceValue::Off, "off"},\n' +
        '    {TraceValue::Messages, "messages"},\n' +
        '    {TraceValue::Verbose, "verbose"},\n' +
        '})\n' +
        '\n' +
        'JSONIFY(TextDocumentIdentifier, uri)\n' +
        '\n' +
        'JSONIFY_FWD(SelectionRange)\n' +
        '\n' +
        'JSONIFY(VersionedTextDocumentIdentifier, version, uri)\n' +
        '\n' +
        'JSONIFY(SetTraceParams, value, token)\n' +
        '}\n',
    );
  });

  it('should render the notification and request headers', async () => {
    const { artifacts } = generateArtifacts(await loadModel(modelPath));

    expect(artifacts[2].content).toBe(
      HEADER +
        '#include "notificationmessage.h"\n' +
        '#include "types.h"\n' +
        '\n' +
        'namespace Lsp {\n' +
        '\n' +
        'inline constexpr char SetTraceName[] = "$/setTrace";\n' +
        'struct SetTraceNotification : public NotificationMessage<SetTraceName, SetTraceParams>\n' +
        '{};\n' +
        '\n' +
        'inline constexpr char ExitName[] = "exit";\n' +
        'struct ExitNotification : public NotificationMessage<ExitName, std::nullptr_t>\n' +
        '{};\n' +
        '}\n',
    );
    expect(artifacts[3].content).toBe(
      HEADER +
        '#include "requestmessage.h"\n' +
        '#include "types.h"\n' +
        '\n' +
        'namespace Lsp {\n' +
        '\n' +
        'inline constexpr char TextDocumentSelectionRangeName[] = "textDocument/selectionRange";\n' +
        'struct TextDocumentSelectionRangeRequest : public RequestMessage<TextDocumentSelectionRangeName, TextDocumentIdentifier, std::vector<SelectionRange>, std::nullptr_t>\n' +
        '{};\n' +
        '\n' +
        'inline constexpr char ShutdownName[] = "shutdown";\n' +
        'struct ShutdownRequest : public RequestMessage<ShutdownName, std::nullptr_t, std::nullptr_t, std::nullptr_t>\n' +
        '{};\n' +
        '}\n',
    );
  });

  it('should produce identical output on repeated runs', async () => {
    const first = generateArtifacts(await loadModel(modelPath));
    const second = generateArtifacts(await loadModel(modelPath));
    expect(second).toEqual(first);
  });

  it('should produce identical output when normalizing twice', async () => {
    const model = await loadModel(modelPath);
    const generator = new CodeGenerator({ config: DEFAULT_GENERATOR_CONFIG });
    const first = generator.generate(model);
    const again = generator.generate(model);
    expect(again.artifacts).toEqual(first.artifacts);
  });
});

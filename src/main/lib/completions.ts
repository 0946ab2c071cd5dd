/**
 * Shell completion scripts. Parcel names are completed at run time through
 * `list --names`, so the scripts never go stale when the config changes.
 */

export const COMPLETION_SHELLS = ["bash", "zsh", "fish"] as const;
export type CompletionShell = (typeof COMPLETION_SHELLS)[number];

export function isCompletionShell(value: string): value is CompletionShell {
  return COMPLETION_SHELLS.some((shell) => shell === value);
}

export const SUBCOMMANDS = [
  { name: "open", description: "Opens a parcel by name" },
  { name: "choose", description: "Opens parcels by choosing from a list" },
  { name: "list", description: "Lists all available parcels" },
  { name: "completions", description: "Generate shell completions" },
] as const;

export type Subcommand = (typeof SUBCOMMANDS)[number]["name"];

export function describeSubcommand(name: Subcommand): string {
  const subcommand = SUBCOMMANDS.find((candidate) => candidate.name === name);
  return subcommand?.description ?? "";
}

const SUBCOMMAND_NAMES = SUBCOMMANDS.map((subcommand) => subcommand.name);

function bashScript(program: string): string {
  const fn = `_${program.replace(/[^A-Za-z0-9_]/g, "_")}`;
  const names = `${program} "\${config_args[@]}" list --names 2>/dev/null`;
  return `${fn}() {
  local cur cmd="" i
  local -a config_args=()
  cur="\${COMP_WORDS[COMP_CWORD]}"
  for ((i = 1; i < COMP_CWORD; i++)); do
    case "\${COMP_WORDS[i]}" in
      -c|--config)
        config_args=(--config "\${COMP_WORDS[i+1]/#\\~/$HOME}")
        ((i++))
        ;;
      -*) ;;
      *) [[ -z "$cmd" ]] && cmd="\${COMP_WORDS[i]}" ;;
    esac
  done

  case "$cmd" in
    "")
      if [[ "$cur" == -* ]]; then
        COMPREPLY=($(compgen -W "-c --config -h --help -V --version" -- "$cur"))
      else
        COMPREPLY=($(compgen -W "${SUBCOMMAND_NAMES.join(" ")}" -- "$cur"))
      fi
      ;;
    open)
      COMPREPLY=($(compgen -W "$(${names})" -- "$cur"))
      ;;
    list)
      if [[ "$cur" == -* ]]; then
        COMPREPLY=($(compgen -W "--json --names" -- "$cur"))
      else
        COMPREPLY=($(compgen -W "$(${names})" -- "$cur"))
      fi
      ;;
    choose)
      COMPREPLY=($(compgen -W "--multi" -- "$cur"))
      ;;
    completions)
      COMPREPLY=($(compgen -W "${COMPLETION_SHELLS.join(" ")}" -- "$cur"))
      ;;
  esac
}
complete -F ${fn} ${program}
`;
}

function zshScript(program: string): string {
  const commands = SUBCOMMANDS.map(
    ({ name, description }) => `        '${name}:${description}'`,
  ).join("\n");
  return `#compdef ${program}

_${program}_parcels() {
  local -a parcels
  parcels=(\${(f)"$(${program} $config_args list --names 2>/dev/null)"})
  _describe 'parcel' parcels
}

_${program}() {
  local line state
  _arguments -C \\
    '(-c --config)'{-c,--config}'[Override the default config path]:config file:_files' \\
    '(- *)'{-h,--help}'[Show help]' \\
    '(- *)'{-V,--version}'[Show version]' \\
    '1: :->command' \\
    '*:: :->args'

  # Read by _${program}_parcels, which runs inside this function
  local -a config_args
  if (( \${+opt_args[-c]} )); then
    config_args=(--config "\${(Q)opt_args[-c]}")
  elif (( \${+opt_args[--config]} )); then
    config_args=(--config "\${(Q)opt_args[--config]}")
  fi

  case $state in
    command)
      local -a commands
      commands=(
${commands}
      )
      _describe 'command' commands
      ;;
    args)
      case $line[1] in
        open) _arguments '1:parcel:_${program}_parcels' ;;
        list) _arguments '--json[Output in JSON format]' '--names[Print parcel names only]' '1:parcel:_${program}_parcels' ;;
        choose) _arguments '--multi[Allow multiple selections]' ;;
        completions) _arguments '1:shell:(${COMPLETION_SHELLS.join(" ")})' ;;
      esac
      ;;
  esac
}

_${program} "$@"
`;
}

function fishScript(program: string): string {
  const namesFn = `__${program}_parcel_names`;
  const lines = [
    `function ${namesFn}`,
    "    set -l tokens (commandline -opc)",
    "    set -l config_args",
    "    for i in (seq 2 (count $tokens))",
    "        if contains -- $tokens[$i] -c --config; and test $i -lt (count $tokens)",
    "            set config_args --config $tokens[(math $i + 1)]",
    "        end",
    "    end",
    `    ${program} $config_args list --names 2>/dev/null`,
    "end",
    "",
    `complete -c ${program} -f`,
    `complete -c ${program} -s c -l config -r -F -d 'Override the default config path'`,
    ...SUBCOMMANDS.map(
      ({ name, description }) =>
        `complete -c ${program} -n __fish_use_subcommand -a ${name} -d '${description}'`,
    ),
    `complete -c ${program} -n '__fish_seen_subcommand_from open list' -a '(${namesFn})'`,
    `complete -c ${program} -n '__fish_seen_subcommand_from list' -l json -d 'Output in JSON format'`,
    `complete -c ${program} -n '__fish_seen_subcommand_from list' -l names -d 'Print parcel names only'`,
    `complete -c ${program} -n '__fish_seen_subcommand_from choose' -l multi -d 'Allow multiple selections'`,
    `complete -c ${program} -n '__fish_seen_subcommand_from completions' -a '${COMPLETION_SHELLS.join(" ")}'`,
  ];
  return `${lines.join("\n")}\n`;
}

export function generateCompletions(
  shell: CompletionShell,
  program = "parcels",
): string {
  switch (shell) {
    case "bash":
      return bashScript(program);
    case "zsh":
      return zshScript(program);
    case "fish":
      return fishScript(program);
  }
}

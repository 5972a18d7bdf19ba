/**
 * Anki note types for exported cards.
 *
 * The multiple-choice back template restores the learner's selection from
 * the front, marks each option label correct or incorrect against the
 * CorrectAnswer field, and scores the selection.
 */

export const MODEL_ID = 1607392319001;
export const FREETEXT_MODEL_ID = MODEL_ID + 1;

export interface NoteModel {
  id: number;
  name: string;
  fields: string[];
  css: string;
  qfmt: string;
  afmt: string;
}

export const MCQ_FIELDS = ['Front', 'CorrectAnswer', 'Explanation', 'ScoreText', 'Percent', 'Sources', 'Multi', 'CardId'];

export const FREETEXT_FIELDS = ['Front', 'CorrectAnswer', 'Explanation'];

export const CARD_CSS = `
.background { margin-bottom: 16px; }
.question    { font-size: 1.1em; margin-bottom: 8px; font-weight: bold; }
.options     { border: 1px solid #666; padding: 10px; display: inline-block; }
.option      { margin: 6px 0; }
.option input{ margin-right: 6px; }
#answer-section { margin-top: 12px; }
.correct { color: green !important; font-weight: bold; }
.incorrect { color: red !important; }
hr#answer-divider { border: none; border-top: 1px solid #888; margin: 16px 0; }
#answer-section { color: white; }
#explanation { color: white; }

.vital-signs-monitor {
    background: #1a1a1a;
    color: #00ff00;
    font-family: 'Courier New', monospace;
    padding: 15px;
    border: 2px solid #333;
    border-radius: 8px;
    margin: 10px 0;
}

.monitor {
    background: #000;
    color: #00ff00;
    font-family: monospace;
    padding: 10px;
    border: 1px solid #333;
}

table {
    border-collapse: collapse;
    width: 100%;
    margin: 10px 0;
    background: white;
    color: black;
}

table th, table td {
    border: 1px solid #ddd;
    padding: 8px;
    text-align: left;
    color: black !important;
    background: white;
}

table th {
    background-color: #f2f2f2 !important;
    font-weight: bold;
    color: black !important;
}

#explanation table, #answer-section table {
    background: white !important;
    color: black !important;
    border: 2px solid #333;
    margin: 15px 0;
}

#explanation table th, #answer-section table th {
    background-color: #e6e6e6 !important;
    color: black !important;
    font-weight: bold;
    border: 1px solid #666;
}

#explanation table td, #answer-section table td {
    background: white !important;
    color: black !important;
    border: 1px solid #666;
}

#explanation h4, #answer-section h4 {
    color: #4CAF50;
    font-weight: bold;
    margin-top: 20px;
    margin-bottom: 10px;
}

.extracted-images {
    margin: 15px 0;
    padding: 10px;
    border: 1px solid #ddd;
    border-radius: 5px;
    background: #fafafa;
}

.extracted-images img {
    max-width: 100%;
    height: auto;
    margin: 5px;
    border: 1px solid #ccc;
    border-radius: 3px;
    box-shadow: 0 2px 4px rgba(0,0,0,0.1);
}

.extracted-images img[width] {
    max-width: 100% !important;
    width: auto !important;
    height: auto !important;
}
`;

const MCQ_FRONT = `
{{Front}}
<script>
(function(){
  var key = "sel_{{CardId}}";
  localStorage.removeItem(key);
  document.querySelectorAll('.option input').forEach(function(input){
    input.addEventListener('change', function(){
      var selected = Array.from(document.querySelectorAll('.option input:checked')).map(function(e){ return e.id; });
      localStorage.setItem(key, JSON.stringify(selected));
    });
  });
})();
</script>
`;

const MCQ_BACK = `
{{Front}}
<script>
(function(){
  var saved = JSON.parse(localStorage.getItem("sel_{{CardId}}") || '[]');
  saved.forEach(function(id){
    var input = document.getElementById(id);
    if(input) input.checked = true;
  });
})();
</script>
<hr id="answer-divider">
<div id="correct-answers" style="display:none">{{CorrectAnswer}}</div>
<script>
(function(){
  var answers = document.getElementById('correct-answers').textContent.split(" ||| ").map(function(s){ return s.trim(); });
  document.querySelectorAll('.option label').forEach(function(label){
    var text = label.innerText.trim(),
        input = document.getElementById(label.getAttribute('for'));
    if(answers.includes(text)){
      label.classList.add('correct');
    } else if(input && input.checked){
      label.classList.add('incorrect');
    }
  });
})();
</script>
<div id="answer-section">
  <b>Correct answer(s):</b> {{CorrectAnswer}}<br>
  <b>Score:</b> <span id="score-text">{{ScoreText}}</span><br>
  <b>Percent:</b> <span id="percent-text">{{Percent}}</span>
</div>
<script>
(function(){
  var normalize = function(s){ return s.replace(/\\s+/g, ' ').trim(); };
  var answers = document.getElementById('correct-answers').textContent.split(" ||| ").map(normalize);
  var selected = Array.from(document.querySelectorAll('.option input:checked')).map(function(input){ return normalize(input.value); });
  var correctLen = answers.length;
  var selectedCorrect = selected.filter(function(value){ return answers.indexOf(value) !== -1; }).length;
  var scoreEl = document.getElementById('score-text');
  var pctEl = document.getElementById('percent-text');
  if(scoreEl){
    scoreEl.innerText = selectedCorrect + " / " + correctLen;
  }
  if(pctEl){
    pctEl.innerText = (correctLen > 0 ? Math.round((selectedCorrect / correctLen) * 100) : 0) + "%";
  }
})();
</script>
{{#Sources}}
<hr>
<div id="sources">
  <b>Sources:</b><br>
  {{{Sources}}}
</div>
{{/Sources}}
<hr>
{{#Explanation}}
<div id="explanation"><b>Explanation:</b> {{Explanation}}</div>
{{/Explanation}}
`;

const FREETEXT_BACK = `
{{Front}}
<hr id="answer-divider">
<div id="answer-section">
  <b>Answer:</b> <span style="color:white;">{{CorrectAnswer}}</span>
</div>
{{#Explanation}}
<div id="explanation"><b>Explanation:</b> <span style="color:white;">{{Explanation}}</span></div>
{{/Explanation}}
`;

export const MCQ_MODEL: NoteModel = {
  id: MODEL_ID,
  name: 'MCQ Q&A',
  fields: MCQ_FIELDS,
  css: CARD_CSS,
  qfmt: MCQ_FRONT,
  afmt: MCQ_BACK,
};

export const FREETEXT_MODEL: NoteModel = {
  id: FREETEXT_MODEL_ID,
  name: 'FreeText Q&A',
  fields: FREETEXT_FIELDS,
  css: CARD_CSS,
  qfmt: '{{Front}}',
  afmt: FREETEXT_BACK,
};
